import type { Command } from '../cli/types'
import { reportError } from '../cli/report'
import { formatFragmentList } from '../format'
import { logInfo } from '../logging'

const command: Command = {
  name: 'list',
  description: 'List enabled and disabled configurations',
  run(ctx) {
    try {
      logInfo(formatFragmentList(ctx.manager.list()))
      return 0
    }
    catch (error) {
      return reportError(error, ctx)
    }
  },
}

export default command
