import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logSuccess } from '../logging'

const command: Command = {
  name: 'cfg-add',
  description: 'Add a configuration file to conf.d-available',
  run(ctx) {
    return runEach(ctx, (sourcePath) => {
      const name = ctx.manager.addConfig(sourcePath)
      logSuccess(`Added '${name}' (run with --enable ${name} to load it)`)
    })
  },
}

export default command
