import * as fs from 'fs'
import { Recipe } from '../entity/recipe'
import { InvalidRecipe } from '../error/types'
import { builtinRecipes } from './builtin'
import { validateRecipe } from './validate'
import { assertNever } from '../utils'

export type RecipeSource =
    | Readonly<{kind: "file", path: string}>
    | Readonly<{kind: "builtin", name: string}>

function invalid(description: string): InvalidRecipe {
    return {isError: true, kind: "invalid-recipe", description}
}

function parseJson(text: string, path: string): unknown {
    try {
        return JSON.parse(text)
    } catch (e) {
        throw invalid(`${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
    }
}

async function readSource(source: RecipeSource): Promise<{raw: unknown, origin: string}> {
    switch (source.kind) {
        case "builtin":
            if (!(source.name in builtinRecipes)) {
                throw invalid(`No built-in recipe named ${source.name}. Known: ${Object.keys(builtinRecipes).join(", ")}`)
            }
            return {raw: builtinRecipes[source.name], origin: `built-in recipe ${source.name}`}
        case "file":
            if (!fs.existsSync(source.path)) {
                throw invalid(`Unable to find recipe file (${source.path}).`)
            }
            return {
                raw: parseJson(await fs.promises.readFile(source.path, {encoding: "utf-8"}), source.path),
                origin: source.path,
            }
        default:
            return assertNever(source)
    }
}

export async function loadRecipe(source: RecipeSource): Promise<Recipe> {
    const {raw, origin} = await readSource(source)
    const result = validateRecipe(raw)
    if (result.kind === "error") {
        throw invalid(`${origin}: ${result.reason}`)
    }
    return result.recipe
}
