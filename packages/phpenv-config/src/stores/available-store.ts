import fs from 'node:fs'
import path from 'node:path'
import { logVerbose } from '../logging'
import { fragmentFileName, namesFromEntries } from '../naming'

/**
 * conf.d-available: the durable copy of every known fragment
 */
export class AvailableStore {
  constructor(readonly dir: string) {}

  ensure(): void {
    fs.mkdirSync(this.dir, { recursive: true })
  }

  pathFor(name: string): string {
    return path.join(this.dir, fragmentFileName(name))
  }

  has(name: string): boolean {
    return fs.existsSync(this.pathFor(name))
  }

  names(): string[] {
    if (!fs.existsSync(this.dir))
      return []
    return namesFromEntries(fs.readdirSync(this.dir))
  }

  read(name: string): string {
    return fs.readFileSync(this.pathFor(name), 'utf8')
  }

  write(name: string, content: string): void {
    const target = this.pathFor(name)
    fs.writeFileSync(target, content)
    logVerbose(`write ${target}`)
  }

  copyFrom(sourcePath: string, name: string): void {
    const target = this.pathFor(name)
    fs.copyFileSync(sourcePath, target)
    logVerbose(`copy ${sourcePath} -> ${target}`)
  }

  /**
   * Move a file from elsewhere into the store under `name`
   */
  adopt(filePath: string, name: string): void {
    const target = this.pathFor(name)
    fs.renameSync(filePath, target)
    logVerbose(`move ${filePath} -> ${target}`)
  }

  remove(name: string): void {
    const target = this.pathFor(name)
    fs.unlinkSync(target)
    logVerbose(`remove ${target}`)
  }
}
