import { ProvisionStep, Recipe, RecipeStep } from '../entity/recipe'
import { assertNever } from '../utils'
import { aptClean, aptInstall, aptUpdate, writeFile } from '../steps/apt'
import { pipInstall, pipInstallVcs } from '../steps/pip'
import { joinCommands } from '../steps/quote'

function commandFor(step: RecipeStep): string {
    switch (step.kind) {
        case "write-file":
            return writeFile(step.path, step.content)
        case "apt-update":
            return aptUpdate()
        case "apt-install":
            return aptInstall(step.packages)
        case "apt-clean":
            return aptClean()
        case "pip-install":
            return pipInstall(step.requirements)
        case "pip-install-vcs":
            return pipInstallVcs(step.url, step.egg, step.ref)
        case "shell":
            return step.command
        case "group":
            return joinCommands(step.steps.map(commandFor))
        default:
            return assertNever(step)
    }
}

// Outer keys first, so a member's own env wins.
function envFor(step: RecipeStep): Record<string, string> {
    const env: Record<string, string> = {...step.env}
    if (step.kind === "group") {
        step.steps.forEach(member => Object.assign(env, envFor(member)))
    }
    return env
}

export function lowerStep(step: RecipeStep): ProvisionStep {
    return {
        kind: "shell-command",
        command: commandFor(step),
        env: envFor(step),
        cacheable: step.cacheable ?? true,
    }
}

export function lowerRecipe(recipe: Recipe): ProvisionStep[] {
    return recipe.steps.map(lowerStep)
}

export function postStepCommand(recipe: Recipe): string | undefined {
    return recipe.postStep.length === 0 ? undefined : joinCommands(recipe.postStep)
}
