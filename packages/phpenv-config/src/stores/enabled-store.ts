import type { LinkMode } from '../types'
import type { AvailableStore } from './available-store'
import fs from 'node:fs'
import path from 'node:path'
import { logVerbose } from '../logging'
import { fragmentFileName, namesFromEntries } from '../naming'

/**
 * The set of fragments PHP actually loads (conf.d)
 */
export interface EnabledStore {
  readonly dir: string
  ensure: () => void
  pathFor: (name: string) => string
  /** An entry of this name exists, whatever its type */
  isEnabled: (name: string) => boolean
  /** The entry is a link into the available store rather than a plain file */
  isLinked: (name: string) => boolean
  enable: (name: string) => void
  disable: (name: string) => void
  names: () => string[]
}

abstract class DirectoryEnabledStore implements EnabledStore {
  constructor(readonly dir: string, protected readonly available: AvailableStore) {}

  ensure(): void {
    fs.mkdirSync(this.dir, { recursive: true })
  }

  pathFor(name: string): string {
    return path.join(this.dir, fragmentFileName(name))
  }

  isEnabled(name: string): boolean {
    // lstat so a dangling link still counts
    return fs.lstatSync(this.pathFor(name), { throwIfNoEntry: false }) !== undefined
  }

  isLinked(name: string): boolean {
    return fs.lstatSync(this.pathFor(name), { throwIfNoEntry: false })?.isSymbolicLink() ?? false
  }

  disable(name: string): void {
    const entry = this.pathFor(name)
    fs.unlinkSync(entry)
    logVerbose(`unlink ${entry}`)
  }

  names(): string[] {
    if (!fs.existsSync(this.dir))
      return []
    return namesFromEntries(fs.readdirSync(this.dir))
  }

  abstract enable(name: string): void
}

export class SymlinkEnabledStore extends DirectoryEnabledStore {
  enable(name: string): void {
    const target = this.available.pathFor(name)
    const entry = this.pathFor(name)
    fs.symlinkSync(target, entry)
    logVerbose(`symlink ${entry} -> ${target}`)
  }
}

export class CopyEnabledStore extends DirectoryEnabledStore {
  isLinked(): boolean {
    return false
  }

  enable(name: string): void {
    const source = this.available.pathFor(name)
    const entry = this.pathFor(name)
    fs.copyFileSync(source, entry)
    logVerbose(`copy ${source} -> ${entry}`)
  }
}

export function createEnabledStore(mode: LinkMode, dir: string, available: AvailableStore): EnabledStore {
  return mode === 'copy'
    ? new CopyEnabledStore(dir, available)
    : new SymlinkEnabledStore(dir, available)
}
