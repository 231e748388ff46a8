import { Logger } from './logger'

export type StepDefinition<INPUT, ADDED> = Readonly<{
    stepName: string
    func: (arg0: INPUT) => Promise<ADDED>
}>

export class StepFailure extends Error {
    readonly stepName: string
    readonly reason: unknown

    constructor(stepName: string, reason: unknown) {
        super(`Failure in step ${stepName}: ${describeReason(reason)}`)
        this.name = "StepFailure"
        this.stepName = stepName
        this.reason = reason
    }
}

async function runStep<I, O>(step: StepDefinition<I, O>, input: I, logger: Logger): Promise<O> {
    if (step.stepName === "") {
        return step.func(input)
    }
    logger.info(`Running step: ${step.stepName}`)
    try {
        return await step.func(input)
    } catch (e) {
        if (e instanceof StepFailure) {
            throw e
        }
        throw new StepFailure(step.stepName, e)
    }
}

export class Sequence<INPUT extends {}, OUTPUT extends {}> {
    readonly def: StepDefinition<INPUT, OUTPUT>
    private readonly logger: Logger

    constructor(def: StepDefinition<INPUT, OUTPUT>, logger: Logger = console) {
        this.def = def
        this.logger = logger
    }

    then<NEXT extends {}>(nextStep: StepDefinition<INPUT & OUTPUT, NEXT>): Sequence<INPUT, INPUT & OUTPUT & NEXT> {
        return new Sequence<INPUT, INPUT & OUTPUT & NEXT>({
            stepName: "",
            func: async (arg0: INPUT) => {
                const add = await runStep(this.def, arg0, this.logger)
                const next = await runStep(nextStep, {...arg0, ...add}, this.logger)
                return {...arg0, ...add, ...next}
            },
        }, this.logger)
    }

    inject<ADDED extends {}>(added: ADDED): Sequence<INPUT, INPUT & OUTPUT & ADDED> {
        return this.then({stepName: "", func: () => Promise.resolve(added)})
    }

    run(i: INPUT): Promise<OUTPUT> {
        return runStep(this.def, i, this.logger)
    }

}

export function assertNever(x: never): never {
    throw new Error("Unexpected object: " + JSON.stringify(x, null, 2));
}

export function describeReason(reason: unknown): string {
    if (reason instanceof Error) {
        return reason.message
    }
    if (typeof reason === "object" && reason !== null && "description" in reason && typeof reason.description === "string") {
        return reason.description
    }
    return String(reason)
}
