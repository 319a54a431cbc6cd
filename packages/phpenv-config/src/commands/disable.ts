import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logInfo, logSuccess } from '../logging'

const command: Command = {
  name: 'disable',
  description: 'Disable a configuration for the active PHP version',
  run(ctx) {
    return runEach(ctx, (input) => {
      const { name, preserved } = ctx.manager.disable(input)
      if (preserved)
        logInfo(`'${name}' was a plain file, moved it to conf.d-available`)
      logSuccess(`Disabled '${name}'`)
    })
  },
}

export default command
