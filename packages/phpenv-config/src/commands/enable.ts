import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logSuccess } from '../logging'

const command: Command = {
  name: 'enable',
  description: 'Enable a configuration for the active PHP version',
  run(ctx) {
    return runEach(ctx, (input) => {
      const name = ctx.manager.enable(input)
      logSuccess(`Enabled '${name}'`)
    })
  },
}

export default command
