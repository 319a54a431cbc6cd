import type { FragmentKind } from './types'
import path from 'node:path'

export const FRAGMENT_EXTENSION = '.ini'

const KIND_PREFIXES: readonly FragmentKind[] = ['cfg', 'ext']

function stripSuffix(value: string, suffix: string): string {
  return value.endsWith(suffix) ? value.slice(0, -suffix.length) : value
}

/**
 * Canonical fragment name for a path or name: basename without a trailing
 * `.ini`, then without a trailing `.so`.
 */
export function fragmentName(input: string): string {
  return stripSuffix(stripSuffix(path.basename(input), FRAGMENT_EXTENSION), '.so')
}

export function storedName(name: string, kind?: FragmentKind): string {
  return kind ? `${kind}-${name}` : name
}

export function fragmentFileName(name: string): string {
  return `${name}${FRAGMENT_EXTENSION}`
}

export function hasKindPrefix(name: string): boolean {
  return KIND_PREFIXES.some(kind => name.startsWith(`${kind}-`))
}

export function prefixedCandidates(name: string): string[] {
  return KIND_PREFIXES.map(kind => storedName(name, kind))
}

/**
 * Fragment names found in a directory listing, sorted
 */
export function namesFromEntries(entries: string[]): string[] {
  return entries
    .filter(entry => entry.endsWith(FRAGMENT_EXTENSION))
    .map(entry => stripSuffix(entry, FRAGMENT_EXTENSION))
    .sort()
}
