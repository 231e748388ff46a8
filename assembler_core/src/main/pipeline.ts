import { assemble } from './assembler'
import { Recipe } from './entity/recipe'
import { BuildOutcome } from './entity/result'
import { BuildLedger, BuildRecord } from './ledger/types'
import { Logger } from './logger'
import { loadRecipe, RecipeSource } from './recipe/load'
import { formatBaseImage } from './recipe/validate'
import { ContainerRuntime } from './runtime/types'
import { StepDefinition } from './utils'

export function loadRecipeFrom(source: RecipeSource): StepDefinition<{}, {recipe: Recipe}> {
    return {
        stepName: "loading recipe",
        func: () => loadRecipe(source).then(recipe => ({recipe})),
    }
}

export const assembleImage: StepDefinition<{recipe: Recipe, runtime: ContainerRuntime, target: string, logger: Logger}, {outcome: BuildOutcome}> = {
    stepName: "assembling image",
    func: ({recipe, runtime, target, logger}) => assemble(recipe, {runtime, target, logger}).then(outcome => ({outcome})),
}

export function toBuildRecord(recipe: Recipe, target: string, outcome: BuildOutcome): BuildRecord {
    const common = {
        buildId: outcome.buildId,
        recipe: recipe.name,
        base: formatBaseImage(recipe.base),
        target,
        startedAt: outcome.startedAt,
        finishedAt: outcome.finishedAt,
        steps: outcome.steps,
    }
    switch (outcome.kind) {
        case "success":
            return {...common, status: "succeeded", image: outcome.image.id}
        case "error":
            return {...common, status: "failed", failure: outcome.failure.description}
    }
}

export const recordBuild: StepDefinition<{recipe: Recipe, target: string, outcome: BuildOutcome, ledger: BuildLedger}, {record: BuildRecord}> = {
    stepName: "recording build",
    func: async ({recipe, target, outcome, ledger}) => {
        const record = toBuildRecord(recipe, target, outcome)
        await ledger.record(record)
        return {record}
    },
}
