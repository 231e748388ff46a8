import { GluegunPrint } from 'gluegun'
import {
  AssemblerConfig,
  BuildLedger,
  BuildRecord,
  builtinRecipes,
  Logger,
  MemoryBuildLedger,
  MongoBuildLedger,
  parseBaseImage,
  RecipeSource,
} from 'assembler_core'

export type Printer = Pick<GluegunPrint, 'info' | 'warning' | 'error'>

export const DEFAULT_RECIPE = 'ecs-discovery'

export function printLogger(print: Printer): Logger {
  return {
    info: message => print.info(message),
    warn: message => print.warning(message),
    error: message => print.error(message),
  }
}

/**
 * The first argument names a built-in recipe or a recipe file. Without one,
 * the configured recipe file is used if it exists, else the default built-in.
 */
export function recipeSource(argument: string | undefined, config: AssemblerConfig, exists: (path: string) => boolean): RecipeSource {
  if (argument !== undefined) {
    return argument in builtinRecipes ? { kind: 'builtin', name: argument } : { kind: 'file', path: argument }
  }
  if (exists(config.recipe)) {
    return { kind: 'file', path: config.recipe }
  }
  return { kind: 'builtin', name: DEFAULT_RECIPE }
}

export function targetFor(option: unknown, config: AssemblerConfig, recipeName: string): string {
  if (option !== undefined && typeof option !== 'string') {
    throw new Error('--tag needs an image reference such as tools:1.0')
  }
  const target = option ?? config.tag ?? `${recipeName}:latest`
  const parsed = parseBaseImage(target)
  if (parsed.kind === 'error') {
    throw new Error(`Invalid tag: ${parsed.reason}`)
  }
  return `${parsed.image.name}:${parsed.image.tag}`
}

export function limitFor(option: unknown): number {
  if (option === undefined) {
    return 10
  }
  const limit = Number(option)
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error('--limit must be a positive whole number')
  }
  return limit
}

export async function openLedger(config: AssemblerConfig): Promise<BuildLedger> {
  if (config.ledger === undefined) {
    return new MemoryBuildLedger()
  }
  return MongoBuildLedger.connect(config.ledger.uri, config.ledger.database)
}

export function historyRows(records: BuildRecord[]): string[][] {
  return [
    ['BUILD', 'RECIPE', 'TARGET', 'STATUS', 'STARTED', 'RESULT'],
    ...records.map(r => [r.buildId, r.recipe, r.target, r.status, r.startedAt.toISOString(), r.image ?? r.failure ?? '']),
  ]
}
