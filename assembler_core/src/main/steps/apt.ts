import { shellQuote } from './quote'

export const APT_NO_CACHE_POLICY = `DPkg::Post-Invoke {"/bin/rm -f /var/cache/apt/archives/*.deb || true";};`
export const APT_NO_CACHE_POLICY_PATH = "/etc/apt/apt.conf.d/no-cache"

export function aptUpdate(): string {
    return "apt-get update -y"
}

export function aptInstall(packages: readonly string[]): string {
    return ["apt-get", "install", "-y", ...packages.map(shellQuote)].join(" ")
}

// The glob is left for the shell to expand.
export function aptClean(): string {
    return "apt-get clean && rm -rf /var/cache/apt/*"
}

// printf rather than echo: dash's echo expands backslash escapes.
export function writeFile(path: string, content: string): string {
    return `printf '%s\\n' ${shellQuote(content)} | tee ${shellQuote(path)}`
}
