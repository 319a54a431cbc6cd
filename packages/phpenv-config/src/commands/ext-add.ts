import type { Command } from '../cli/types'
import { runEach } from '../cli/report'
import { logSuccess } from '../logging'

const command: Command = {
  name: 'ext-add',
  description: 'Add an extension configuration file to conf.d-available',
  run(ctx) {
    return runEach(ctx, (sourcePath) => {
      const name = ctx.manager.addExtension(sourcePath)
      logSuccess(`Added '${name}' (run with --enable ${name} to load it)`)
    })
  },
}

export default command
