import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logInfo } from '../logging'

const command: Command = {
  name: 'show',
  description: 'Print a configuration with numbered lines',
  run(ctx) {
    return runEach(ctx, (input) => {
      for (const line of ctx.manager.show(input, ctx.counter))
        logInfo(line)
    })
  },
}

export default command
