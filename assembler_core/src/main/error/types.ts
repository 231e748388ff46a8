export type Failure = {
    readonly isError: true
    readonly description: string
}

export type InvalidRecipe = Failure & Readonly<{
    kind: "invalid-recipe"
}>

export type BaseImageUnavailable = Failure & Readonly<{
    kind: "base-unavailable"
    reference: string
}>

export type StepFailed = Failure & Readonly<{
    kind: "step-failed"
    index: number
    command: string
    exitCode: number
    output: string
}>

export type RuntimeFailure = Failure & Readonly<{
    kind: "runtime-failure"
}>

export type BuildFailure = BaseImageUnavailable | StepFailed | RuntimeFailure
