import type { CommandContext } from './types'
import { exitCodeFor, isFragmentError } from '../errors'
import { logError, logInfo } from '../logging'

/**
 * Print a failed operation and turn it into an exit code
 */
export function reportError(error: unknown, ctx: Pick<CommandContext, 'host'>): number {
  if (!isFragmentError(error)) {
    logError(error instanceof Error ? error.message : String(error))
    return 1
  }

  switch (error.kind) {
    case 'AlreadyEnabled':
      logInfo(error.message)
      break
    case 'UnsupportedVersion':
      logError(error.message)
      printInstalledVersions(ctx)
      break
    default:
      logError(error.message)
  }
  return exitCodeFor(error)
}

function printInstalledVersions(ctx: Pick<CommandContext, 'host'>): void {
  let versions: string[]
  try {
    versions = ctx.host.listInstalledVersions()
  }
  catch (error) {
    logError(`could not list installed versions: ${error instanceof Error ? error.message : String(error)}`)
    return
  }

  if (versions.length === 0) {
    logInfo('No PHP versions are installed')
    return
  }
  logInfo('Installed versions:')
  for (const version of versions)
    logInfo(`  ${version}`)
}

/**
 * Run `action` for every value, stopping at the first failure
 */
export function runEach(ctx: CommandContext, action: (value: string) => void): number {
  // no value at all still runs once so the operation reports the missing argument
  const values = ctx.argv.length > 0 ? ctx.argv : ['']
  for (const value of values) {
    try {
      action(value)
    }
    catch (error) {
      const code = reportError(error, ctx)
      if (code !== 0)
        return code
    }
  }
  return 0
}
