import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { Recipe } from '../main/entity/recipe'
import { BuildOutcome } from '../main/entity/result'
import { MemoryBuildLedger } from '../main/ledger/memory'
import { assembleImage, loadRecipeFrom, recordBuild, toBuildRecord } from '../main/pipeline'
import { loadRecipe } from '../main/recipe/load'
import { Sequence } from '../main/utils'
import { FakeRuntime, RecordingLogger } from './fake_runtime'

describe("recipe loading", () => {
    let dir: string

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "assembler-"))
    })

    afterAll(() => {
        fs.rmSync(dir, {recursive: true, force: true})
    })

    it("reads and validates a recipe file", async () => {
        const file = path.join(dir, "tools.json")
        fs.writeFileSync(file, JSON.stringify({
            name: "tools",
            base: "debian:bookworm",
            steps: [{kind: "apt-update"}, {kind: "apt-install", packages: ["curl"]}],
        }))

        const recipe = await loadRecipe({kind: "file", path: file})

        expect(recipe.name).toBe("tools")
        expect(recipe.base).toEqual({name: "debian", tag: "bookworm"})
    })

    it("names the file when validation fails", async () => {
        const file = path.join(dir, "empty.json")
        fs.writeFileSync(file, JSON.stringify({name: "empty", base: "debian:jessie", steps: []}))

        await expect(loadRecipe({kind: "file", path: file})).rejects.toEqual({
            isError: true,
            kind: "invalid-recipe",
            description: `${file}: steps: a recipe needs at least one step`,
        })
    })

    it("rejects a file that is not JSON", async () => {
        const file = path.join(dir, "broken.json")
        fs.writeFileSync(file, "{ name: ")

        await expect(loadRecipe({kind: "file", path: file})).rejects.toMatchObject({kind: "invalid-recipe"})
    })

    it("rejects a missing file", async () => {
        const file = path.join(dir, "missing.json")

        await expect(loadRecipe({kind: "file", path: file})).rejects.toEqual({
            isError: true,
            kind: "invalid-recipe",
            description: `Unable to find recipe file (${file}).`,
        })
    })

    it("lists the built-in recipes when the name is unknown", async () => {
        await expect(loadRecipe({kind: "builtin", name: "nope"})).rejects.toMatchObject({
            description: "No built-in recipe named nope. Known: ecs-discovery",
        })
    })
})

describe("build pipeline", () => {
    it("loads, assembles and records a build", async () => {
        const runtime = new FakeRuntime()
        const ledger = new MemoryBuildLedger()
        const logger = new RecordingLogger()

        const result = await new Sequence(loadRecipeFrom({kind: "builtin", name: "ecs-discovery"}), logger)
            .inject({runtime, ledger, logger, target: "ecs-discovery:latest"})
            .then(assembleImage)
            .then(recordBuild)
            .run({})

        expect(result.outcome.kind).toBe("success")
        expect(result.record).toMatchObject({
            recipe: "ecs-discovery",
            base: "debian:jessie",
            target: "ecs-discovery:latest",
            status: "succeeded",
            image: "sha256:layer-6",
        })
        expect(await ledger.list(5)).toEqual([result.record])
        expect(logger.lines.slice(0, 3)).toEqual([
            "info: Running step: loading recipe",
            "info: Running step: assembling image",
            expect.stringMatching(/^info: Step 1\/3: printf /),
        ])
    })

    it("records a failed build with its reason", async () => {
        const recipe: Recipe = await loadRecipe({kind: "builtin", name: "ecs-discovery"})
        const at = new Date("2026-03-01T12:00:00Z")
        const outcome: BuildOutcome = {
            kind: "error",
            buildId: "b1",
            failure: {isError: true, kind: "runtime-failure", description: "Container runtime failed: disk full"},
            steps: [],
            startedAt: at,
            finishedAt: at,
        }

        expect(toBuildRecord(recipe, "ecs-discovery:1", outcome)).toEqual({
            buildId: "b1",
            recipe: "ecs-discovery",
            base: "debian:jessie",
            target: "ecs-discovery:1",
            status: "failed",
            failure: "Container runtime failed: disk full",
            startedAt: at,
            finishedAt: at,
            steps: [],
        })
    })
})
