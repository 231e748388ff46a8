import { BuildFailure } from '../error/types'

export type ResultingImage = Readonly<{
    id: string
    reference: string
    base: string
    layers: readonly string[]
    defaultCommand: readonly string[]
}>

export type StepStatus = "succeeded" | "cached" | "failed" | "not-run"

export type StepReport = Readonly<{
    index: number
    command: string
    status: StepStatus
    layer?: string
}>

type OutcomeBase = Readonly<{
    buildId: string
    steps: readonly StepReport[]
    startedAt: Date
    finishedAt: Date
}>

export type BuildOutcome =
    | OutcomeBase & Readonly<{kind: "success", image: ResultingImage}>
    | OutcomeBase & Readonly<{kind: "error", failure: BuildFailure}>

export type StepEvent = Readonly<{
    index: number
    total: number
    command: string
    status: "running" | StepStatus
}>
