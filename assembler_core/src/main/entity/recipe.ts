export type BaseImage = Readonly<{
    name: string
    tag: string
}>

export type Pinning = "required" | "allow-unpinned"

export type StepOptions = Readonly<{
    env?: Readonly<Record<string, string>>
    cacheable?: boolean
}>

export type PipRequirement = Readonly<{
    name: string
    version?: string
}>

export type WriteFile = Readonly<{kind: "write-file", path: string, content: string}>
export type AptUpdate = Readonly<{kind: "apt-update"}>
export type AptInstall = Readonly<{kind: "apt-install", packages: readonly string[]}>
export type AptClean = Readonly<{kind: "apt-clean"}>
export type PipInstall = Readonly<{kind: "pip-install", requirements: readonly PipRequirement[]}>
export type PipInstallVcs = Readonly<{kind: "pip-install-vcs", url: string, ref?: string, egg: string}>
export type ShellStep = Readonly<{kind: "shell", command: string}>
export type Group = Readonly<{kind: "group", steps: readonly RecipeStep[]}>

export type RecipeStep = StepOptions & (
    | WriteFile
    | AptUpdate
    | AptInstall
    | AptClean
    | PipInstall
    | PipInstallVcs
    | ShellStep
    | Group
)

// What a recipe file holds, before the base reference is parsed and defaults applied.
export type RecipeDocument = Readonly<{
    name: string
    base: string
    steps: readonly RecipeStep[]
    postStep?: readonly string[]
    defaultCommand?: readonly string[]
    pinning?: Pinning
}>

export type Recipe = Readonly<{
    name: string
    base: BaseImage
    steps: readonly RecipeStep[]
    postStep: readonly string[]
    defaultCommand: readonly string[]
    pinning: Pinning
}>

export type ProvisionStep = Readonly<{
    kind: "shell-command"
    command: string
    env: Readonly<Record<string, string>>
    cacheable: boolean
}>

export const DEFAULT_COMMAND: readonly string[] = ["bash"]
