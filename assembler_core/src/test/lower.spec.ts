import { Recipe } from '../main/entity/recipe'
import { ecsDiscoveryRecipe } from '../main/recipe/builtin'
import { lowerRecipe, lowerStep } from '../main/recipe/lower'
import { validateRecipe } from '../main/recipe/validate'
import { pipInstallVcs, requirementSpecifier } from '../main/steps/pip'
import { shellQuote } from '../main/steps/quote'

function builtin(): Recipe {
    const result = validateRecipe(ecsDiscoveryRecipe)
    if (result.kind === "error") {
        throw new Error(result.reason)
    }
    return result.recipe
}

describe("lowering recipes", () => {
    it("turns the built-in recipe into three shell commands", () => {
        expect(lowerRecipe(builtin())).toEqual([
            {
                kind: "shell-command",
                command: `printf '%s\\n' 'DPkg::Post-Invoke {"/bin/rm -f /var/cache/apt/archives/*.deb || true";};' | tee /etc/apt/apt.conf.d/no-cache`,
                env: {},
                cacheable: true,
            },
            {
                kind: "shell-command",
                command: "apt-get update -y && apt-get clean && rm -rf /var/cache/apt/* && apt-get install -y git python-pip",
                env: {DEBIAN_FRONTEND: "noninteractive"},
                cacheable: true,
            },
            {
                kind: "shell-command",
                command: "apt-get install -y wget"
                    + " && pip install 'git+https://github.com/ross-urban/aws-ecs-service-discovery.git@master#egg=ecs_discovery'"
                    + " && pip install Jinja2==2.11.3 simplejson==3.17.6 boto3==1.17.112",
                env: {DEBIAN_FRONTEND: "noninteractive"},
                cacheable: true,
            },
        ])
    })

    it("lets a group member override the group's environment", () => {
        const step = lowerStep({
            kind: "group",
            env: {A: "1", B: "1"},
            steps: [{kind: "shell", command: "true", env: {B: "2"}}],
        })

        expect(step.env).toEqual({A: "1", B: "2"})
    })

    it("carries the cacheable flag", () => {
        expect(lowerStep({kind: "apt-update", cacheable: false}).cacheable).toBe(false)
    })
})

describe("command builders", () => {
    it("quotes only what the shell would interpret", () => {
        expect(shellQuote("python-pip")).toBe("python-pip")
        expect(shellQuote("a b")).toBe("'a b'")
        expect(shellQuote("it's")).toBe(`'it'\\''s'`)
        expect(shellQuote("")).toBe("''")
    })

    it("pins requirements with ==", () => {
        expect(requirementSpecifier({name: "boto3", version: "1.17.112"})).toBe("boto3==1.17.112")
        expect(requirementSpecifier({name: "boto3"})).toBe("boto3")
    })

    it("leaves out the ref of an unpinned repository install", () => {
        expect(pipInstallVcs("https://example.com/tools.git", "tools")).toBe("pip install 'git+https://example.com/tools.git#egg=tools'")
    })
})
