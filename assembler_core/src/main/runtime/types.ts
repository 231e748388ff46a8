export type RunRequest = Readonly<{
    image: string
    command: string
    env: Readonly<Record<string, string>>
    name: string
}>

export type RunResult = Readonly<{
    container: string
    exitCode: number
    output: string
}>

export type CommitOptions = Readonly<{
    defaultCommand?: readonly string[]
    labels?: Readonly<Record<string, string>>
}>

/**
 * The operations the assembler needs from a container engine. Every layer is
 * produced by running a command in a container and committing it.
 */
export interface ContainerRuntime {
    /** Resolves with the image id; rejects when the image can't be made available. */
    pull(reference: string): Promise<string>
    run(request: RunRequest): Promise<RunResult>
    commit(container: string, options: CommitOptions): Promise<string>
    findImage(labels: Readonly<Record<string, string>>): Promise<string | undefined>
    tag(image: string, reference: string): Promise<void>
    removeContainer(container: string): Promise<void>
    removeImage(image: string): Promise<void>
}
