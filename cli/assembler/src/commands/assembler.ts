import { GluegunCommand } from 'gluegun'


const command: GluegunCommand = {
  name: 'assembler',
  run: async toolbox => {
    const { print } = toolbox

    print.info('Welcome to the image assembler')
    print.info('Run `assembler build [recipe]` to assemble an image, or `assembler help` for every command')
  },
}

module.exports = command
