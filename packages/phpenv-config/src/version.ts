import type { CommandRunner } from './host'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { runCommand } from './host'

export const packageDir: string = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..')

interface PackageManifest {
  name: string
  version: string
}

export function readPackageManifest(dir: string = packageDir): PackageManifest {
  const parsed: unknown = JSON.parse(fs.readFileSync(path.join(dir, 'package.json'), 'utf8'))
  if (typeof parsed !== 'object' || parsed === null)
    return { name: 'phpenv-config', version: '0.0.0' }
  const name = 'name' in parsed && typeof parsed.name === 'string' ? parsed.name : 'phpenv-config'
  const version = 'version' in parsed && typeof parsed.version === 'string' ? parsed.version : '0.0.0'
  return { name, version }
}

/**
 * `git@github.com:someone/phpenv-config.git` -> `phpenv-config`
 */
export function repositoryShortName(remoteUrl: string): string {
  const trimmed = remoteUrl.trim().replace(/\/+$/, '').replace(/\.git$/, '')
  const segments = trimmed.split(/[/:]/)
  return segments[segments.length - 1]
}

function git(run: CommandRunner, dir: string, args: string[]): string | undefined {
  try {
    return run('git', ['-C', dir, ...args]) || undefined
  }
  catch {
    return undefined
  }
}

export function describeVersion(run: CommandRunner = runCommand, dir: string = packageDir): string {
  const manifest = readPackageManifest(dir)
  const remote = git(run, dir, ['config', '--get', 'remote.origin.url'])
  const revision = git(run, dir, ['rev-parse', '--short', 'HEAD'])
  const name = remote ? repositoryShortName(remote) : manifest.name
  return `${name} v${manifest.version} (${revision ?? 'unknown'})`
}
