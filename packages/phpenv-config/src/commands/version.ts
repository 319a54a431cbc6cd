import type { Command } from '../cli/types'
import { logInfo } from '../logging'
import { describeVersion } from '../version'

const command: Command = {
  name: 'version',
  description: 'Show version information',
  run() {
    logInfo(describeVersion())
    return 0
  },
}

export default command
