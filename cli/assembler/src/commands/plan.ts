import { GluegunToolbox, GluegunCommand } from 'gluegun'
import { planRecipe } from '../actions'


const command: GluegunCommand = {
  name: 'plan',
  alias: ['p'],
  description: 'List the commands a build would run, one layer each',
  run: async (toolbox: GluegunToolbox) => {
    const code = await planRecipe(toolbox)
    if (code !== 0) {
      process.exit(code)
    }
  }
}

module.exports = command
