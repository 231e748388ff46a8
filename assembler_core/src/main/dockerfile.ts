import { ProvisionStep, Recipe } from './entity/recipe'
import { lowerRecipe, postStepCommand } from './recipe/lower'
import { formatBaseImage } from './recipe/validate'
import { joinCommands, shellQuote } from './steps/quote'

function runLine(step: ProvisionStep, hook: string | undefined): string {
    const exports = Object.entries(step.env).map(([key, value]) => `export ${key}=${shellQuote(value)}`)
    const commands = [...exports, step.command, ...(hook === undefined ? [] : [hook])]
    return `RUN ${joinCommands(commands)}`
}

/**
 * The same build expressed for `docker build`: one RUN per provision step, so
 * the layer boundaries match what the assembler commits, except that the
 * post-step hook shares its step's layer.
 */
export function renderDockerfile(recipe: Recipe): string {
    const hook = postStepCommand(recipe)
    return [
        `# recipe: ${recipe.name}`,
        `FROM ${formatBaseImage(recipe.base)}`,
        "",
        ...lowerRecipe(recipe).map(step => runLine(step, hook)),
        "",
        `CMD ${JSON.stringify(recipe.defaultCommand)}`,
        "",
    ].join("\n")
}
