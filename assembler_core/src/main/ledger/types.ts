import { StepReport } from '../entity/result'

export type BuildRecord = Readonly<{
    buildId: string
    recipe: string
    base: string
    target: string
    status: "succeeded" | "failed"
    startedAt: Date
    finishedAt: Date
    image?: string
    failure?: string
    steps: readonly StepReport[]
}>

export interface BuildLedger {
    record(build: BuildRecord): Promise<void>
    /** Newest first. */
    list(limit: number): Promise<BuildRecord[]>
    close(): Promise<void>
}
