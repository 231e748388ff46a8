const SAFE_ARGUMENT = /^[A-Za-z0-9_.\/:=@+%,-]+$/

export function shellQuote(arg: string): string {
    if (SAFE_ARGUMENT.test(arg)) {
        return arg
    }
    return `'${arg.replace(/'/g, `'\\''`)}'`
}

export function joinCommands(commands: readonly string[]): string {
    return commands.join(" && ")
}
