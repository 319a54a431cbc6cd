import type { FragmentManager } from './manager'

export interface FlagDefinition {
  short: string
  long: string
  command: string
  arg?: 'path' | 'name'
  description: string
}

export const FLAGS: readonly FlagDefinition[] = [
  { short: '-c', long: '--cfg-add', command: 'cfg-add', arg: 'path', description: 'Add a configuration file to conf.d-available' },
  { short: '-x', long: '--ext-add', command: 'ext-add', arg: 'path', description: 'Add an extension configuration file to conf.d-available' },
  { short: '-X', long: '--ext-new', command: 'ext-new', arg: 'name', description: 'Create an extension configuration from an extension name' },
  { short: '-r', long: '--rm', command: 'rm', arg: 'name', description: 'Remove a configuration' },
  { short: '-e', long: '--enable', command: 'enable', arg: 'name', description: 'Enable a configuration' },
  { short: '-d', long: '--disable', command: 'disable', arg: 'name', description: 'Disable a configuration' },
  { short: '-l', long: '--list', command: 'list', description: 'List enabled and disabled configurations' },
  { short: '-s', long: '--show', command: 'show', arg: 'name', description: 'Show a configuration with line numbers' },
  { short: '-V', long: '--version', command: 'version', description: 'Show version information' },
  { short: '-h', long: '--help', command: 'help', description: 'Show this help' },
]

export function findFlag(flag: string): FlagDefinition | undefined {
  const bare = flag.replace(/^-+/, '')
  return FLAGS.find(def => def.short === flag || def.long === flag || def.command === bare)
}

/**
 * Candidates for the word following `flag`, one per entry
 */
export function completionsFor(flag: string | undefined, manager: FragmentManager): string[] {
  const def = flag ? findFlag(flag) : undefined
  if (!def)
    return FLAGS.map(f => f.long)

  switch (def.command) {
    case 'enable':
      return manager.list().disabled
    case 'disable':
      return manager.list().enabled
    case 'rm':
    case 'show':
      return manager.availableNames()
    default:
      // paths are completed by the shell, the rest take no argument
      return []
  }
}
