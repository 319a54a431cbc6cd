import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logSuccess } from '../logging'

const command: Command = {
  name: 'rm',
  description: 'Remove a configuration from conf.d-available and conf.d',
  run(ctx) {
    return runEach(ctx, (input) => {
      const name = ctx.manager.remove(input)
      logSuccess(`Removed '${name}'`)
    })
  },
}

export default command
