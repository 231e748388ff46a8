export * as Entities from './src/main/entity/recipe'
export * as Results from './src/main/entity/result'
export * as Errors from './src/main/error/types'
export * as Utilities from './src/main/utils'

export { Logger } from './src/main/logger'
export { validateRecipe, parseBaseImage, formatBaseImage, ValidationResult } from './src/main/recipe/validate'
export { lowerRecipe, lowerStep } from './src/main/recipe/lower'
export { loadRecipe, RecipeSource } from './src/main/recipe/load'
export { builtinRecipes, ecsDiscoveryRecipe } from './src/main/recipe/builtin'
export { renderDockerfile } from './src/main/dockerfile'
export { assemble, AssembleOptions } from './src/main/assembler'
export { ContainerRuntime, RunRequest, RunResult, CommitOptions } from './src/main/runtime/types'
export { Shell, ShellResult, ChildProcessShell } from './src/main/runtime/shell'
export { DockerRuntime } from './src/main/runtime/docker'
export { BuildLedger, BuildRecord } from './src/main/ledger/types'
export { MemoryBuildLedger } from './src/main/ledger/memory'
export { MongoBuildLedger } from './src/main/ledger/mongo'
export { AssemblerConfig, CONFIG_FILE, loadAssemblerConfig } from './src/main/config/load'
export { loadRecipeFrom, assembleImage, recordBuild, toBuildRecord } from './src/main/pipeline'
