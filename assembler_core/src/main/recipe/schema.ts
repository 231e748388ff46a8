import { z } from 'zod'
import { RecipeDocument, RecipeStep } from '../entity/recipe'

const APT_PACKAGE = /^[a-z0-9][a-z0-9+.-]*(=[A-Za-z0-9.+:~-]+)?$/
const PIP_NAME = /^[A-Za-z0-9]([A-Za-z0-9._-]*[A-Za-z0-9])?$/
const PIP_VERSION = /^[A-Za-z0-9][A-Za-z0-9.+!_-]*$/
const EGG = /^[A-Za-z0-9_.-]+$/
const VCS_URL = /^(https?|ssh|git|file):\/\/\S+$/

const stepOptions = {
    env: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid environment variable name"), z.string()).optional(),
    cacheable: z.boolean().optional(),
}

const nonEmptyCommand = z.string().regex(/\S/, "command must not be empty")

const pipRequirement = z.object({
    name: z.string().regex(PIP_NAME, "invalid requirement name"),
    version: z.string().regex(PIP_VERSION, "invalid version").optional(),
}).strict()

export const recipeStepSchema: z.ZodType<RecipeStep> = z.discriminatedUnion("kind", [
    z.object({kind: z.literal("write-file"), path: z.string().regex(/^\/\S*$/, "path must be absolute"), content: z.string(), ...stepOptions}).strict(),
    z.object({kind: z.literal("apt-update"), ...stepOptions}).strict(),
    z.object({
        kind: z.literal("apt-install"),
        packages: z.array(z.string().regex(APT_PACKAGE, "invalid package name")).min(1, "needs at least one package"),
        ...stepOptions,
    }).strict(),
    z.object({kind: z.literal("apt-clean"), ...stepOptions}).strict(),
    z.object({
        kind: z.literal("pip-install"),
        requirements: z.array(pipRequirement).min(1, "needs at least one requirement"),
        ...stepOptions,
    }).strict(),
    z.object({
        kind: z.literal("pip-install-vcs"),
        url: z.string().regex(VCS_URL, "invalid repository url"),
        ref: z.string().regex(/^[^\s#@]+$/, "invalid ref").optional(),
        egg: z.string().regex(EGG, "invalid egg name"),
        ...stepOptions,
    }).strict(),
    z.object({kind: z.literal("shell"), command: nonEmptyCommand, ...stepOptions}).strict(),
    z.object({
        kind: z.literal("group"),
        steps: z.array(z.lazy(() => recipeStepSchema)).min(1, "group must contain at least one step"),
        ...stepOptions,
    }).strict(),
])

export const recipeDocumentSchema: z.ZodType<RecipeDocument> = z.object({
    name: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, "recipe name must be lowercase letters, digits, '.', '_' or '-'"),
    base: z.string().min(1, "base image is required"),
    steps: z.array(recipeStepSchema).min(1, "a recipe needs at least one step"),
    postStep: z.array(nonEmptyCommand).optional(),
    defaultCommand: z.array(z.string().min(1)).min(1, "default command must not be empty").optional(),
    pinning: z.enum(["required", "allow-unpinned"]).optional(),
}).strict()

export function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`).join("; ")
}
