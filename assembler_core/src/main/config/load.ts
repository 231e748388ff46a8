import { z } from 'zod'
import { formatIssues } from '../recipe/schema'

export const CONFIG_FILE = ".assemblerrc"

const configSchema = z.object({
    recipe: z.string().min(1).default("assembler.json"),
    tag: z.string().min(1).optional(),
    docker: z.string().min(1).default("docker"),
    ledger: z.object({
        uri: z.string().regex(/^mongodb(\+srv)?:\/\//, "must be a mongodb:// connection string"),
        database: z.string().min(1).default("assembler"),
    }).optional(),
})

export type AssemblerConfig = z.infer<typeof configSchema>

// Unknown keys are dropped: the CLI framework keeps its own entries in the same object.
export function loadAssemblerConfig(raw: unknown): AssemblerConfig {
    const parsed = configSchema.safeParse(raw ?? {})
    if (!parsed.success) {
        throw new Error(`Invalid configuration in ${CONFIG_FILE}: ${formatIssues(parsed.error)}`)
    }
    return parsed.data
}
