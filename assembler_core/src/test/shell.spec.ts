import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { lowerStep } from '../main/recipe/lower'
import { ChildProcessShell } from '../main/runtime/shell'

describe("child process shell", () => {
    const shell = new ChildProcessShell()

    it("captures the exit code and both streams", async () => {
        await expect(shell.run(["sh", "-c", "printf x; printf y >&2; exit 3"])).resolves.toEqual({
            code: 3,
            stdout: "x",
            stderr: "y",
        })
    })

    it("rejects an empty command", async () => {
        await expect(shell.run([])).rejects.toThrow("Cannot run an empty command")
    })
})

describe("write-file under sh", () => {
    let dir: string

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "assembler-"))
    })

    afterAll(() => {
        fs.rmSync(dir, {recursive: true, force: true})
    })

    it("writes backslashes and a leading -n as given", async () => {
        const file = path.join(dir, "settings.ini")
        const content = "-n path=C:\\new\\temp 'quoted' $HOME"
        const step = lowerStep({kind: "write-file", path: file, content})

        const result = await new ChildProcessShell().run(["sh", "-c", step.command])

        expect(result.code).toBe(0)
        expect(fs.readFileSync(file, "utf-8")).toBe(`${content}\n`)
    })
})
