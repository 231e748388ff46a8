import { PipRequirement } from '../entity/recipe'
import { shellQuote } from './quote'

export function requirementSpecifier(requirement: PipRequirement): string {
    return requirement.version === undefined ? requirement.name : `${requirement.name}==${requirement.version}`
}

export function vcsSpecifier(url: string, egg: string, ref?: string): string {
    const at = ref === undefined ? "" : `@${ref}`
    return `git+${url}${at}#egg=${egg}`
}

export function pipInstall(requirements: readonly PipRequirement[]): string {
    return ["pip", "install", ...requirements.map(r => shellQuote(requirementSpecifier(r)))].join(" ")
}

export function pipInstallVcs(url: string, egg: string, ref?: string): string {
    return `pip install ${shellQuote(vcsSpecifier(url, egg, ref))}`
}
