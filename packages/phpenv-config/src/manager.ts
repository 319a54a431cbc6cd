import type { PhpenvHost } from './host'
import type { EnabledStore } from './stores/enabled-store'
import type { FragmentKind, FragmentList, ManagedPaths, PhpenvConfigOptions } from './types'
import fs from 'node:fs'
import {
  alreadyEnabled,
  ambiguousFragment,
  invalidName,
  invalidSourcePath,
  missingArgument,
  unknownFragment,
  unsupportedVersion,
} from './errors'
import { annotateLines, LineCounter } from './format'
import { managedPaths } from './host'
import { fragmentName, hasKindPrefix, prefixedCandidates, storedName } from './naming'
import { AvailableStore } from './stores/available-store'
import { createEnabledStore } from './stores/enabled-store'

export type ManagerOptions = Pick<PhpenvConfigOptions, 'systemVersion' | 'linkMode'>

export interface DisableResult {
  name: string
  /** A plain file with no available counterpart was moved into the available store */
  preserved: boolean
}

interface OpenStores {
  paths: ManagedPaths
  available: AvailableStore
  enabled: EnabledStore
}

export class FragmentManager {
  private stores?: OpenStores

  constructor(
    private readonly host: PhpenvHost,
    private readonly options: ManagerOptions,
  ) {}

  paths(): ManagedPaths {
    return this.open().paths
  }

  addConfig(sourcePath: string): string {
    return this.add('cfg', sourcePath)
  }

  addExtension(sourcePath: string): string {
    return this.add('ext', sourcePath)
  }

  newExtension(extName: string): string {
    if (!extName)
      throw missingArgument('extension name')
    if (/[/\\]/.test(extName))
      throw invalidName(extName)
    const { available } = this.open()
    const ext = fragmentName(extName)
    const name = storedName(ext, 'ext')
    available.write(name, `extension=${ext}.so\n`)
    return name
  }

  enable(input: string): string {
    const { available, enabled } = this.open()
    const name = this.resolve(input, candidate => available.has(candidate))
    if (!available.has(name))
      throw unknownFragment(name)
    if (enabled.isEnabled(name))
      throw alreadyEnabled(name)
    enabled.enable(name)
    return name
  }

  disable(input: string): DisableResult {
    const { available, enabled } = this.open()
    const name = this.resolve(input, candidate => enabled.isEnabled(candidate))
    if (!enabled.isEnabled(name))
      throw unknownFragment(name)

    if (!enabled.isLinked(name) && !available.has(name)) {
      available.adopt(enabled.pathFor(name), name)
      return { name, preserved: true }
    }

    enabled.disable(name)
    return { name, preserved: false }
  }

  remove(input: string): string {
    const { available, enabled } = this.open()
    const name = this.resolve(input, candidate => available.has(candidate))
    if (!available.has(name))
      throw unknownFragment(name)
    if (enabled.isEnabled(name))
      enabled.disable(name)
    available.remove(name)
    return name
  }

  list(): FragmentList {
    const { available, enabled } = this.open()
    const enabledNames = enabled.names()
    const enabledSet = new Set(enabledNames)
    return {
      enabled: enabledNames,
      disabled: available.names().filter(name => !enabledSet.has(name)),
    }
  }

  availableNames(): string[] {
    return this.open().available.names()
  }

  show(input: string, counter: LineCounter = new LineCounter()): string[] {
    const { available } = this.open()
    const name = this.resolve(input, candidate => available.has(candidate))
    if (!available.has(name))
      throw unknownFragment(name)
    return annotateLines(name, available.read(name), counter)
  }

  private add(kind: FragmentKind, sourcePath: string): string {
    if (!sourcePath)
      throw missingArgument('source file')
    const { available } = this.open()
    if (!fs.statSync(sourcePath, { throwIfNoEntry: false })?.isFile())
      throw invalidSourcePath(sourcePath)

    const name = storedName(fragmentName(sourcePath), kind)
    available.copyFrom(sourcePath, name)
    return name
  }

  /**
   * Map user input to a stored fragment name. An unprefixed name that is not
   * stored as-is resolves to its single `cfg-`/`ext-` match.
   */
  private resolve(input: string, exists: (name: string) => boolean): string {
    if (!input)
      throw missingArgument('fragment name')
    const name = fragmentName(input)
    if (exists(name) || hasKindPrefix(name))
      return name

    const matches = prefixedCandidates(name).filter(exists)
    if (matches.length > 1)
      throw ambiguousFragment(name, matches)
    return matches[0] ?? name
  }

  private open(): OpenStores {
    if (this.stores)
      return this.stores

    const version = this.host.activeVersion()
    if (version === this.options.systemVersion)
      throw unsupportedVersion(version)

    const paths = managedPaths(this.host.root(), version)
    const available = new AvailableStore(paths.available)
    const enabled = createEnabledStore(this.options.linkMode, paths.enabled, available)
    available.ensure()
    enabled.ensure()

    this.stores = { paths, available, enabled }
    return this.stores
  }
}
