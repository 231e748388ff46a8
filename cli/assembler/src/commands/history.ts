import { GluegunToolbox, GluegunCommand } from 'gluegun'
import { showHistory } from '../actions'


const command: GluegunCommand = {
  name: 'history',
  alias: ['hi'],
  description: 'Show recent builds from the ledger (--limit <n>)',
  run: async (toolbox: GluegunToolbox) => {
    const code = await showHistory(toolbox)
    if (code !== 0) {
      process.exit(code)
    }
  }
}

module.exports = command
