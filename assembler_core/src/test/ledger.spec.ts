import { MemoryBuildLedger } from '../main/ledger/memory'
import { BuildRecord } from '../main/ledger/types'

function record(buildId: string, startedAt: string): BuildRecord {
    return {
        buildId,
        recipe: "ecs-discovery",
        base: "debian:jessie",
        target: "ecs-discovery:latest",
        status: "succeeded",
        startedAt: new Date(startedAt),
        finishedAt: new Date(startedAt),
        image: "sha256:layer-6",
        steps: [],
    }
}

describe("memory build ledger", () => {
    it("lists the newest builds first", async () => {
        const ledger = new MemoryBuildLedger()
        await ledger.record(record("a", "2026-01-01T00:00:00Z"))
        await ledger.record(record("c", "2026-01-03T00:00:00Z"))
        await ledger.record(record("b", "2026-01-02T00:00:00Z"))

        expect((await ledger.list(10)).map(r => r.buildId)).toEqual(["c", "b", "a"])
        expect((await ledger.list(2)).map(r => r.buildId)).toEqual(["c", "b"])
    })
})
