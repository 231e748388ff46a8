import { GluegunToolbox, GluegunCommand } from 'gluegun'
import { buildImage } from '../actions'


const command: GluegunCommand = {
  name: 'build',
  alias: ['b'],
  description: 'Assemble an image from a recipe (--tag <name:tag>)',
  run: async (toolbox: GluegunToolbox) => {
    const code = await buildImage(toolbox)
    if (code !== 0) {
      process.exit(code)
    }
  }
}

module.exports = command
