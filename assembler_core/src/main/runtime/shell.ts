import * as child_process from 'child_process'

export type ShellResult = Readonly<{
    code: number
    stdout: string
    stderr: string
}>

export interface Shell {
    run(argv: readonly string[]): Promise<ShellResult>
}

export class ChildProcessShell implements Shell {
    run(argv: readonly string[]): Promise<ShellResult> {
        const [file, ...args] = argv
        if (file === undefined) {
            return Promise.reject(new Error("Cannot run an empty command"))
        }
        return new Promise((resolve, reject) => {
            const proc = child_process.spawn(file, args, {stdio: ["ignore", "pipe", "pipe"]})
            const stdout: Buffer[] = []
            const stderr: Buffer[] = []
            proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk))
            proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk))
            proc.on("error", reject)
            proc.on("close", code => resolve({
                // A process killed by a signal has no exit code.
                code: code ?? 1,
                stdout: Buffer.concat(stdout).toString("utf-8"),
                stderr: Buffer.concat(stderr).toString("utf-8"),
            }))
        })
    }
}
