import { GluegunToolbox, GluegunCommand } from 'gluegun'
import { emitDockerfile } from '../actions'


const command: GluegunCommand = {
  name: 'emit',
  alias: ['e'],
  description: 'Write the recipe as a Dockerfile (--out <file>, else stdout)',
  run: async (toolbox: GluegunToolbox) => {
    const code = await emitDockerfile(toolbox)
    if (code !== 0) {
      process.exit(code)
    }
  }
}

module.exports = command
