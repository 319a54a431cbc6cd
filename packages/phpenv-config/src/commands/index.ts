import type { Command } from '../cli/types'

// Lazy command resolvers, keyed by the flag's long name without dashes
const registry: Record<string, () => Promise<Command>> = {
  'cfg-add': async () => (await import('./cfg-add')).default,
  'ext-add': async () => (await import('./ext-add')).default,
  'ext-new': async () => (await import('./ext-new')).default,
  'rm': async () => (await import('./rm')).default,
  'enable': async () => (await import('./enable')).default,
  'disable': async () => (await import('./disable')).default,
  'list': async () => (await import('./list')).default,
  'show': async () => (await import('./show')).default,
  'version': async () => (await import('./version')).default,
}

export async function resolveCommand(name?: string): Promise<Command | undefined> {
  if (!name)
    return undefined
  const loader = registry[name]
  if (!loader)
    return undefined
  return loader()
}
