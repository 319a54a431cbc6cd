import type { FragmentList } from './types'

/**
 * Running line number for `show`. One counter shared between several
 * fragments keeps counting across all of them.
 */
export class LineCounter {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  next(): number {
    this.current += 1
    return this.current
  }

  get value(): number {
    return this.current
  }
}

export function splitContentLines(content: string): string[] {
  if (content === '')
    return []
  const lines = content.split(/\r?\n/)
  // a trailing newline ends the last line, it does not start a new one
  if (lines[lines.length - 1] === '')
    lines.pop()
  return lines
}

export function annotateLines(name: string, content: string, counter: LineCounter): string[] {
  return splitContentLines(content).map(line => `[${name}:${counter.next()}] = ${line}`)
}

export function formatFragmentList(list: FragmentList): string {
  const section = (title: string, names: string[]) => [
    `${title}:`,
    ...(names.length > 0 ? names.map(name => `  ${name}`) : ['  (none)']),
  ]

  return [
    ...section('enabled', list.enabled),
    ...section('disabled', list.disabled),
  ].join('\n')
}
