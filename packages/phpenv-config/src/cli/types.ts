import type { LineCounter } from '../format'
import type { PhpenvHost } from '../host'
import type { FragmentManager } from '../manager'

export interface CommandContext {
  // values given to the command's flag, in order
  argv: string[]
  manager: FragmentManager
  host: PhpenvHost
  // shared by every `show` in one invocation
  counter: LineCounter
}

export interface Command {
  name: string
  description?: string
  run: (ctx: CommandContext) => Promise<number> | number
}
