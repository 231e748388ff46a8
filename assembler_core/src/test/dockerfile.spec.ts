import { renderDockerfile } from '../main/dockerfile'
import { ecsDiscoveryRecipe } from '../main/recipe/builtin'
import { validateRecipe } from '../main/recipe/validate'

describe("dockerfile rendering", () => {
    function render(doc: unknown): string[] {
        const result = validateRecipe(doc)
        if (result.kind === "error") {
            throw new Error(result.reason)
        }
        return renderDockerfile(result.recipe).split("\n")
    }

    it("renders the built-in recipe", () => {
        const hook = "rm -f /var/cache/apt/archives/*.deb && rm -rf /root/.cache/pip"

        expect(render(ecsDiscoveryRecipe)).toEqual([
            "# recipe: ecs-discovery",
            "FROM debian:jessie",
            "",
            `RUN printf '%s\\n' 'DPkg::Post-Invoke {"/bin/rm -f /var/cache/apt/archives/*.deb || true";};' | tee /etc/apt/apt.conf.d/no-cache && ${hook}`,
            `RUN export DEBIAN_FRONTEND=noninteractive && apt-get update -y && apt-get clean && rm -rf /var/cache/apt/* && apt-get install -y git python-pip && ${hook}`,
            "RUN export DEBIAN_FRONTEND=noninteractive && apt-get install -y wget"
                + " && pip install 'git+https://github.com/ross-urban/aws-ecs-service-discovery.git@master#egg=ecs_discovery'"
                + ` && pip install Jinja2==2.11.3 simplejson==3.17.6 boto3==1.17.112 && ${hook}`,
            "",
            `CMD ["bash"]`,
            "",
        ])
    })

    it("quotes environment values and honours a custom default command", () => {
        const lines = render({
            name: "custom",
            base: "alpine",
            steps: [{kind: "shell", command: "echo $GREETING", env: {GREETING: "hello world"}}],
            defaultCommand: ["sh", "-l"],
        })

        expect(lines).toEqual([
            "# recipe: custom",
            "FROM alpine:latest",
            "",
            "RUN export GREETING='hello world' && echo $GREETING",
            "",
            `CMD ["sh","-l"]`,
            "",
        ])
    })
})
