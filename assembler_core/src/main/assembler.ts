import * as crypto from 'crypto'
import { ProvisionStep, Recipe } from './entity/recipe'
import { BuildOutcome, ResultingImage, StepEvent, StepReport, StepStatus } from './entity/result'
import { BaseImageUnavailable, BuildFailure } from './error/types'
import { Logger } from './logger'
import { lowerRecipe, postStepCommand } from './recipe/lower'
import { formatBaseImage } from './recipe/validate'
import { ContainerRuntime } from './runtime/types'

export const CACHE_LABEL = "io.image-assembler.cache-key"
export const BUILD_LABEL = "io.image-assembler.build"

export type AssembleOptions = Readonly<{
    runtime: ContainerRuntime
    target: string
    logger?: Logger
    buildId?: string
    onStep?: (event: StepEvent) => void
}>

type Layer =
    | Readonly<{kind: "layer", image: string, cached: boolean}>
    | Readonly<{kind: "exit", exitCode: number, output: string}>

export function cacheKey(parent: string, command: string, env: Readonly<Record<string, string>>, defaultCommand: readonly string[]): string {
    const material = JSON.stringify([parent, command, Object.entries(env).sort(), defaultCommand])
    return crypto.createHash("sha256").update(material).digest("hex")
}

function newBuildId(): string {
    return crypto.randomBytes(6).toString("hex")
}

/**
 * Everything a single build has created, so a failed build can be undone.
 * Images are removed newest first since each one is the parent of the next.
 */
class Created {
    readonly containers: Set<string> = new Set()
    readonly images: string[] = []

    async discard(runtime: ContainerRuntime, logger: Logger): Promise<void> {
        for (const container of [...this.containers]) {
            await this.removeContainer(runtime, container, logger)
        }
        for (const image of [...this.images].reverse()) {
            await runtime.removeImage(image).catch(e => logger.warn(`Could not remove image ${image}: ${e instanceof Error ? e.message : String(e)}`))
        }
        this.images.length = 0
    }

    async removeContainer(runtime: ContainerRuntime, container: string, logger: Logger): Promise<void> {
        await runtime.removeContainer(container).catch(e => logger.warn(`Could not remove container ${container}: ${e instanceof Error ? e.message : String(e)}`))
        this.containers.delete(container)
    }
}

class Assembly {
    private readonly recipe: Recipe
    private readonly runtime: ContainerRuntime
    private readonly logger: Logger
    private readonly buildId: string
    private readonly created = new Created()
    private containerCount = 0

    constructor(recipe: Recipe, runtime: ContainerRuntime, logger: Logger, buildId: string) {
        this.recipe = recipe
        this.runtime = runtime
        this.logger = logger
        this.buildId = buildId
    }

    /** Runs one command on top of `parent`, or reuses a layer a previous build committed for it. */
    async layer(parent: string, command: string, env: Readonly<Record<string, string>>, cacheable: boolean): Promise<Layer> {
        const key = cacheKey(parent, command, env, this.recipe.defaultCommand)
        if (cacheable) {
            const cached = await this.runtime.findImage({[CACHE_LABEL]: key})
            if (cached !== undefined) {
                return {kind: "layer", image: cached, cached: true}
            }
        }

        const name = `assembler-${this.buildId}-${this.containerCount++}`
        this.created.containers.add(name)
        try {
            const run = await this.runtime.run({image: parent, command, env, name})
            if (run.exitCode !== 0) {
                return {kind: "exit", exitCode: run.exitCode, output: run.output}
            }
            const image = await this.runtime.commit(run.container, {
                defaultCommand: this.recipe.defaultCommand,
                labels: {[CACHE_LABEL]: key, [BUILD_LABEL]: this.buildId},
            })
            this.created.images.push(image)
            return {kind: "layer", image, cached: false}
        } finally {
            await this.created.removeContainer(this.runtime, name, this.logger)
        }
    }

    discard(): Promise<void> {
        return this.created.discard(this.runtime, this.logger)
    }
}

async function pullBase(runtime: ContainerRuntime, base: string): Promise<Readonly<{kind: "pulled", id: string}> | BaseImageUnavailable> {
    try {
        return {kind: "pulled", id: await runtime.pull(base)}
    } catch (e) {
        return {
            isError: true,
            kind: "base-unavailable",
            reference: base,
            description: `Base image ${base} is unavailable: ${e instanceof Error ? e.message : String(e)}`,
        }
    }
}

export async function assemble(recipe: Recipe, options: AssembleOptions): Promise<BuildOutcome> {
    const logger = options.logger ?? console
    const buildId = options.buildId ?? newBuildId()
    const notify = options.onStep ?? (() => {})
    const startedAt = new Date()
    const steps: ProvisionStep[] = lowerRecipe(recipe)
    const hook = postStepCommand(recipe)
    const base = formatBaseImage(recipe.base)
    const assembly = new Assembly(recipe, options.runtime, logger, buildId)

    const statuses: StepStatus[] = steps.map(() => "not-run")
    const layers: (string | undefined)[] = steps.map(() => undefined)
    const report = (): StepReport[] => steps.map((step, index) => ({
        index,
        command: step.command,
        status: statuses[index],
        ...(layers[index] === undefined ? {} : {layer: layers[index]}),
    }))

    const fail = async (failure: BuildFailure): Promise<BuildOutcome> => {
        logger.error(failure.description)
        await assembly.discard()
        return {kind: "error", buildId, failure, steps: report(), startedAt, finishedAt: new Date()}
    }

    const pulled = await pullBase(options.runtime, base)
    if (pulled.kind === "base-unavailable") {
        return fail(pulled)
    }
    let parent = pulled.id

    const chain: string[] = []
    let current: number | undefined
    try {
        for (const [index, step] of steps.entries()) {
            current = index
            const event = {index, total: steps.length, command: step.command}
            logger.info(`Step ${index + 1}/${steps.length}: ${step.command}`)
            notify({...event, status: "running"})

            const phases: {command: string, env: Readonly<Record<string, string>>, hook: boolean}[] = [
                {command: step.command, env: step.env, hook: false},
            ]
            if (hook !== undefined) {
                phases.push({command: hook, env: {}, hook: true})
            }

            let cached = true
            for (const {command, env, hook: isHook} of phases) {
                const layer = await assembly.layer(parent, command, env, step.cacheable)
                if (layer.kind === "exit") {
                    statuses[index] = "failed"
                    notify({...event, status: "failed"})
                    const phase = isHook ? " (post-step hook)" : ""
                    return fail({
                        isError: true,
                        kind: "step-failed",
                        index,
                        command,
                        exitCode: layer.exitCode,
                        output: layer.output,
                        description: `Step ${index + 1}${phase} exited with ${layer.exitCode}: ${command}`,
                    })
                }
                cached = cached && layer.cached
                parent = layer.image
                chain.push(layer.image)
            }

            statuses[index] = cached ? "cached" : "succeeded"
            layers[index] = parent
            notify({...event, status: statuses[index]})
        }

        await options.runtime.tag(parent, options.target)
    } catch (e) {
        if (current !== undefined && statuses[current] === "not-run") {
            statuses[current] = "failed"
        }
        return fail({
            isError: true,
            kind: "runtime-failure",
            description: `Container runtime failed: ${e instanceof Error ? e.message : String(e)}`,
        })
    }

    const image: ResultingImage = {
        id: parent,
        reference: options.target,
        base,
        layers: chain,
        defaultCommand: recipe.defaultCommand,
    }
    logger.info(`Built ${options.target} (${parent})`)
    return {kind: "success", buildId, image, steps: report(), startedAt, finishedAt: new Date()}
}
