import { BaseImage, DEFAULT_COMMAND, Recipe, RecipeDocument, RecipeStep } from '../entity/recipe'
import { formatIssues, recipeDocumentSchema } from './schema'

export type ValidationResult =
    | Readonly<{kind: "success", recipe: Recipe}>
    | Readonly<{kind: "error", reason: string}>

export type BaseImageParse =
    | Readonly<{kind: "success", image: BaseImage}>
    | Readonly<{kind: "error", reason: string}>

const IMAGE_NAME = /^(?:[a-z0-9.-]+(?::[0-9]+)?\/)?[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/
const IMAGE_TAG = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/

export function parseBaseImage(reference: string): BaseImageParse {
    if (reference.length === 0) {
        return {kind: "error", reason: "base image reference must not be empty"}
    }
    if (reference.includes("@")) {
        return {kind: "error", reason: `digest references are not supported: ${reference}`}
    }
    const colon = reference.lastIndexOf(":")
    const slash = reference.lastIndexOf("/")
    const name = colon > slash ? reference.slice(0, colon) : reference
    const tag = colon > slash ? reference.slice(colon + 1) : "latest"
    if (tag.length === 0) {
        return {kind: "error", reason: `missing tag after ":" in ${reference}`}
    }
    if (!IMAGE_NAME.test(name)) {
        return {kind: "error", reason: `invalid image name "${name}"`}
    }
    if (!IMAGE_TAG.test(tag)) {
        return {kind: "error", reason: `invalid tag "${tag}"`}
    }
    return {kind: "success", image: {name, tag}}
}

export function formatBaseImage(image: BaseImage): string {
    return `${image.name}:${image.tag}`
}

function unpinned(steps: readonly RecipeStep[], path: string): string[] {
    const problems: string[] = []
    steps.forEach((step, i) => {
        const at = `${path}.${i}`
        switch (step.kind) {
            case "pip-install":
                step.requirements
                    .filter(r => r.version === undefined)
                    .forEach(r => problems.push(`${at}: ${r.name} is not pinned to a version`))
                break
            case "pip-install-vcs":
                if (step.ref === undefined) {
                    problems.push(`${at}: ${step.egg} from ${step.url} is not pinned to a ref`)
                }
                break
            case "group":
                problems.push(...unpinned(step.steps, `${at}.steps`))
                break
        }
    })
    return problems
}

export function validateRecipe(raw: unknown): ValidationResult {
    const parsed = recipeDocumentSchema.safeParse(raw)
    if (!parsed.success) {
        return {kind: "error", reason: formatIssues(parsed.error)}
    }
    const doc: RecipeDocument = parsed.data
    const base = parseBaseImage(doc.base)
    if (base.kind === "error") {
        return {kind: "error", reason: `base: ${base.reason}`}
    }
    const pinning = doc.pinning ?? "required"
    if (pinning === "required") {
        const problems = unpinned(doc.steps, "steps")
        if (problems.length > 0) {
            return {kind: "error", reason: problems.join("; ")}
        }
    }
    return {
        kind: "success",
        recipe: {
            name: doc.name,
            base: base.image,
            steps: doc.steps,
            postStep: doc.postStep ?? [],
            defaultCommand: doc.defaultCommand ?? DEFAULT_COMMAND,
            pinning,
        }
    }
}
