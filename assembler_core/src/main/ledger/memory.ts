import { BuildLedger, BuildRecord } from './types'

export class MemoryBuildLedger implements BuildLedger {
    private readonly records: BuildRecord[] = []

    record(build: BuildRecord): Promise<void> {
        this.records.push(build)
        return Promise.resolve()
    }

    list(limit: number): Promise<BuildRecord[]> {
        const newestFirst = [...this.records].sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
        return Promise.resolve(newestFirst.slice(0, limit))
    }

    close(): Promise<void> {
        return Promise.resolve()
    }
}
