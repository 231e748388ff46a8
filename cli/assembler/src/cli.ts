import { build, GluegunToolbox } from 'gluegun'

/**
 * Create the cli and kick it off
 */
export async function run(argv: string[]): Promise<GluegunToolbox> {
  // create a CLI runtime
  const cli = build()
    .brand('assembler')
    .src(__dirname)
    .version()
    .help() // provides default for help, h, --help, -h
    .exclude(['strings', 'prompt', 'template', 'patching', 'package-manager', 'http', 'system', 'semver'])
    .create()

  // send it back (for testing, mostly)
  return cli.run(argv)
}
