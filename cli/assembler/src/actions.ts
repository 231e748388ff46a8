import { GluegunPrint, GluegunToolbox } from 'gluegun'
import {
  AssemblerConfig,
  assembleImage,
  BuildLedger,
  ChildProcessShell,
  CONFIG_FILE,
  ContainerRuntime,
  DockerRuntime,
  formatBaseImage,
  loadAssemblerConfig,
  loadRecipe,
  loadRecipeFrom,
  lowerRecipe,
  RecipeSource,
  recordBuild,
  renderDockerfile,
  Utilities,
} from 'assembler_core'
import { historyRows, limitFor, openLedger, printLogger, recipeSource, targetFor } from './helper'

/** The part of the gluegun toolbox the commands use. */
export type CommandToolbox = Readonly<{
  parameters: Pick<GluegunToolbox['parameters'], 'first' | 'options'>
  print: Pick<GluegunPrint, 'info' | 'warning' | 'error' | 'success' | 'table'>
  filesystem: Pick<GluegunToolbox['filesystem'], 'exists' | 'write'>
  config: unknown
}>

export type BuildDependencies = Readonly<{
  runtime: ContainerRuntime
  ledger: BuildLedger
}>

// Each action resolves with the exit code for its command.

async function reported(print: CommandToolbox['print'], action: () => Promise<number>): Promise<number> {
  try {
    return await action()
  } catch (e) {
    print.error(Utilities.describeReason(e))
    return 1
  }
}

function sourceFor(toolbox: CommandToolbox, config: AssemblerConfig): RecipeSource {
  return recipeSource(toolbox.parameters.first, config, path => toolbox.filesystem.exists(path) !== false)
}

export function planRecipe(toolbox: CommandToolbox): Promise<number> {
  const { print } = toolbox
  return reported(print, async () => {
    const recipe = await loadRecipe(sourceFor(toolbox, loadAssemblerConfig(toolbox.config)))
    print.info(`${recipe.name} from ${formatBaseImage(recipe.base)}`)
    lowerRecipe(recipe).forEach((step, index) => {
      const env = Object.entries(step.env).map(([key, value]) => `${key}=${value} `).join('')
      const cache = step.cacheable ? '' : ' (never cached)'
      print.info(`  ${index + 1}. ${env}${step.command}${cache}`)
    })
    if (recipe.postStep.length > 0) {
      print.info(`  after each step: ${recipe.postStep.join(' && ')}`)
    }
    print.info(`  default command: ${JSON.stringify(recipe.defaultCommand)}`)
    return 0
  })
}

export function emitDockerfile(toolbox: CommandToolbox, stdout: (text: string) => void = text => process.stdout.write(text)): Promise<number> {
  const { print, parameters, filesystem } = toolbox
  return reported(print, async () => {
    const recipe = await loadRecipe(sourceFor(toolbox, loadAssemblerConfig(toolbox.config)))
    const dockerfile = renderDockerfile(recipe)
    const out: unknown = parameters.options.out
    if (typeof out === 'string') {
      filesystem.write(out, dockerfile)
      print.success(`Wrote ${out}`)
    } else {
      stdout(dockerfile)
    }
    return 0
  })
}

export async function dockerDependencies(config: AssemblerConfig): Promise<BuildDependencies> {
  return {
    runtime: new DockerRuntime(new ChildProcessShell(), config.docker),
    ledger: await openLedger(config),
  }
}

export function buildImage(
  toolbox: CommandToolbox,
  open: (config: AssemblerConfig) => Promise<BuildDependencies> = dockerDependencies,
): Promise<number> {
  const { print, parameters } = toolbox
  return reported(print, async () => {
    const config = loadAssemblerConfig(toolbox.config)
    const logger = printLogger(print)
    const source = sourceFor(toolbox, config)
    const tag: unknown = parameters.options.tag
    const { runtime, ledger } = await open(config)

    try {
      const { outcome, record } = await new Utilities.Sequence(loadRecipeFrom(source), logger)
        .then({
          stepName: 'resolving target',
          func: ({ recipe }) => Promise.resolve({ target: targetFor(tag, config, recipe.name) }),
        })
        .inject({ runtime, ledger, logger })
        .then(assembleImage)
        .then(recordBuild)
        .run({})

      if (outcome.kind === 'success') {
        print.success(`${outcome.image.reference} is ready (build ${record.buildId})`)
        return 0
      }
      if (outcome.failure.kind === 'step-failed' && outcome.failure.output.length > 0) {
        print.info(outcome.failure.output)
      }
      print.error(`Build ${record.buildId} failed: ${outcome.failure.description}`)
      return 1
    } finally {
      await ledger.close()
    }
  })
}

export function showHistory(
  toolbox: CommandToolbox,
  open: (config: AssemblerConfig) => Promise<BuildLedger> = openLedger,
): Promise<number> {
  const { print, parameters } = toolbox
  return reported(print, async () => {
    const config = loadAssemblerConfig(toolbox.config)
    if (config.ledger === undefined) {
      print.warning(`No ledger is configured in ${CONFIG_FILE}; builds are not kept between runs`)
      return 0
    }
    const limit = limitFor(parameters.options.limit)
    const ledger = await open(config)
    try {
      const records = await ledger.list(limit)
      if (records.length === 0) {
        print.info('No builds recorded yet')
      } else {
        print.table(historyRows(records), { format: 'lean' })
      }
      return 0
    } finally {
      await ledger.close()
    }
  })
}
