import type { ManagedPaths, PhpenvConfigOptions } from './types'
import { spawnSync } from 'node:child_process'
import fs from 'node:fs'
import path from 'node:path'
import { hostCommandFailed } from './errors'

/**
 * What the plugin needs to know from the phpenv installation it runs under
 */
export interface PhpenvHost {
  root: () => string
  activeVersion: () => string
  listInstalledVersions: () => string[]
}

export type CommandRunner = (command: string, args: string[]) => string

export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: 'utf8' })
  if (result.error)
    throw hostCommandFailed([command, ...args].join(' '), result.error.message)
  if (result.status !== 0)
    throw hostCommandFailed([command, ...args].join(' '), result.stderr.trim() || `exit code ${result.status}`)
  return result.stdout.trim()
}

/**
 * Host backed by the configured root/version, falling back to asking the
 * `phpenv` executable.
 */
export class ShellPhpenvHost implements PhpenvHost {
  private cachedRoot?: string
  private cachedVersion?: string

  constructor(
    private readonly config: Pick<PhpenvConfigOptions, 'root' | 'version' | 'command'>,
    private readonly run: CommandRunner = runCommand,
  ) {}

  root(): string {
    if (this.cachedRoot === undefined)
      this.cachedRoot = this.config.root ?? this.run(this.config.command, ['root'])
    return this.cachedRoot
  }

  activeVersion(): string {
    if (this.cachedVersion === undefined)
      this.cachedVersion = this.config.version ?? this.run(this.config.command, ['version-name'])
    return this.cachedVersion
  }

  listInstalledVersions(): string[] {
    try {
      return splitLines(this.run(this.config.command, ['versions', '--bare']))
    }
    catch {
      // phpenv missing from PATH, read the versions directory instead
      const versionsDir = path.join(this.root(), 'versions')
      if (!fs.existsSync(versionsDir))
        return []
      return fs.readdirSync(versionsDir, { withFileTypes: true })
        .filter(dirent => dirent.isDirectory())
        .map(dirent => dirent.name)
        .sort()
    }
  }
}

function splitLines(output: string): string[] {
  return output.split('\n').map(line => line.trim()).filter(Boolean)
}

/**
 * The two managed directories for a root/version pair
 */
export function managedPaths(root: string, version: string): ManagedPaths {
  const etc = path.join(root, 'versions', version, 'etc')
  return {
    root,
    version,
    available: path.join(etc, 'conf.d-available'),
    enabled: path.join(etc, 'conf.d'),
  }
}
