import { CommitOptions, ContainerRuntime, RunRequest, RunResult } from './types'
import { Shell, ShellResult } from './shell'

export class DockerRuntime implements ContainerRuntime {
    private readonly shell: Shell
    private readonly docker: string

    constructor(shell: Shell, docker: string = "docker") {
        this.shell = shell
        this.docker = docker
    }

    private exec(...args: string[]): Promise<ShellResult> {
        return this.shell.run([this.docker, ...args])
    }

    private async expectSuccess(...args: string[]): Promise<string> {
        const result = await this.exec(...args)
        if (result.code !== 0) {
            throw new Error(`${this.docker} ${args[0]} exited with ${result.code}: ${result.stderr.trim()}`)
        }
        return result.stdout.trim()
    }

    private async inspectId(reference: string): Promise<string | undefined> {
        const result = await this.exec("image", "inspect", "--format", "{{.Id}}", reference)
        return result.code === 0 ? result.stdout.trim() : undefined
    }

    async pull(reference: string): Promise<string> {
        const local = await this.inspectId(reference)
        if (local !== undefined) {
            return local
        }
        const pulled = await this.exec("pull", reference)
        if (pulled.code !== 0) {
            throw new Error(`Unable to pull ${reference}: ${pulled.stderr.trim()}`)
        }
        const id = await this.inspectId(reference)
        if (id === undefined) {
            throw new Error(`Pulled ${reference} but cannot inspect it`)
        }
        return id
    }

    // The env is set for the command only; `run -e` would be kept in the committed image.
    async run(request: RunRequest): Promise<RunResult> {
        const env = Object.entries(request.env).map(([key, value]) => `${key}=${value}`)
        const command = env.length === 0 ? ["sh", "-c", request.command] : ["env", ...env, "sh", "-c", request.command]
        const result = await this.exec("run", "--name", request.name, request.image, ...command)
        return {
            container: request.name,
            exitCode: result.code,
            output: result.stdout + result.stderr,
        }
    }

    commit(container: string, options: CommitOptions): Promise<string> {
        const changes: string[] = []
        if (options.defaultCommand !== undefined) {
            changes.push("--change", `CMD ${JSON.stringify(options.defaultCommand)}`)
        }
        for (const [key, value] of Object.entries(options.labels ?? {})) {
            changes.push("--change", `LABEL ${key}=${JSON.stringify(value)}`)
        }
        return this.expectSuccess("commit", ...changes, container)
    }

    // --all: layers below the tagged one are untagged parents, which `image ls` hides by default.
    async findImage(labels: Readonly<Record<string, string>>): Promise<string | undefined> {
        const filters = Object.entries(labels).flatMap(([key, value]) => ["--filter", `label=${key}=${value}`])
        const ids = await this.expectSuccess("image", "ls", "--all", "--quiet", "--no-trunc", ...filters)
        const first = ids.split("\n")[0]
        return first === undefined || first === "" ? undefined : first
    }

    async tag(image: string, reference: string): Promise<void> {
        await this.expectSuccess("tag", image, reference)
    }

    async removeContainer(container: string): Promise<void> {
        await this.expectSuccess("rm", "--force", container)
    }

    async removeImage(image: string): Promise<void> {
        await this.expectSuccess("rmi", image)
    }
}
