import type { PhpenvHost } from '../src/host'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

export class StaticHost implements PhpenvHost {
  constructor(
    private readonly rootDir: string,
    public version: string,
    private readonly installed: string[] = [],
  ) {}

  root(): string {
    return this.rootDir
  }

  activeVersion(): string {
    return this.version
  }

  listInstalledVersions(): string[] {
    return this.installed
  }
}

export function makeTempDir(prefix = 'phpenv-config-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, content)
  return filePath
}

export function exists(filePath: string): boolean {
  return fs.lstatSync(filePath, { throwIfNoEntry: false }) !== undefined
}
