import { RecipeDocument } from '../entity/recipe'
import { APT_NO_CACHE_POLICY, APT_NO_CACHE_POLICY_PATH } from '../steps/apt'

const NONINTERACTIVE = {DEBIAN_FRONTEND: "noninteractive"}

/**
 * Debian jessie with git, pip and wget, the ECS service discovery scripts
 * installed from their repository, and the libraries those scripts use.
 * Python 2 is what jessie ships, so the library pins are the last releases
 * that still install there.
 */
export const ecsDiscoveryRecipe: RecipeDocument = {
    name: "ecs-discovery",
    base: "debian:jessie",
    steps: [
        {kind: "write-file", path: APT_NO_CACHE_POLICY_PATH, content: APT_NO_CACHE_POLICY},
        {
            kind: "group",
            env: NONINTERACTIVE,
            steps: [
                {kind: "apt-update"},
                {kind: "apt-clean"},
                {kind: "apt-install", packages: ["git", "python-pip"]},
            ],
        },
        {
            kind: "group",
            env: NONINTERACTIVE,
            steps: [
                {kind: "apt-install", packages: ["wget"]},
                {
                    kind: "pip-install-vcs",
                    url: "https://github.com/ross-urban/aws-ecs-service-discovery.git",
                    ref: "master",
                    egg: "ecs_discovery",
                },
                {
                    kind: "pip-install",
                    requirements: [
                        {name: "Jinja2", version: "2.11.3"},
                        {name: "simplejson", version: "3.17.6"},
                        {name: "boto3", version: "1.17.112"},
                    ],
                },
            ],
        },
    ],
    postStep: ["rm -f /var/cache/apt/archives/*.deb", "rm -rf /root/.cache/pip"],
    defaultCommand: ["bash"],
    pinning: "required",
}

export const builtinRecipes: Readonly<Record<string, RecipeDocument>> = {
    [ecsDiscoveryRecipe.name]: ecsDiscoveryRecipe,
}
