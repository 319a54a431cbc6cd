import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logSuccess } from '../logging'

const command: Command = {
  name: 'ext-new',
  description: 'Create an extension configuration that loads <name>.so',
  run(ctx) {
    return runEach(ctx, (extName) => {
      const name = ctx.manager.newExtension(extName)
      logSuccess(`Created '${name}'`)
    })
  },
}

export default command
