/* eslint-disable no-console */
import type { FlagDefinition } from '../completion'
import type { PhpenvHost } from '../host'
import type { FragmentManager } from '../manager'
import { CAC } from 'cac'
import { resolveCommand } from '../commands'
import { completionsFor, FLAGS } from '../completion'
import { LineCounter } from '../format'
import { logError, logVerbose } from '../logging'

export interface CLIDependencies {
  host: PhpenvHost
  manager: FragmentManager
}

export function createCLI(): CAC {
  const cli = new CAC('phpenv-config')

  cli.usage('[options]')
  for (const flag of FLAGS) {
    if (flag.command === 'help')
      continue
    const rawName = flag.arg ? `${flag.short}, ${flag.long} <${flag.arg}>` : `${flag.short}, ${flag.long}`
    cli.option(rawName, flag.description)
  }
  cli.help()

  cli.example('phpenv-config --ext-new igbinary')
  cli.example('phpenv-config --enable ext-igbinary')
  cli.example('phpenv-config --cfg-add ./opcache.ini --enable cfg-opcache')
  cli.example('phpenv-config --list')

  return cli
}

export interface ScannedArgv {
  // values per command name; flags without an argument collect ''
  values: Map<string, string[]>
  unknown: string[]
  args: string[]
  help: boolean
}

/**
 * Walk argv against FLAGS. Values are kept verbatim, so names such as
 * `010` or `1e3` are not turned into numbers.
 */
export function scanArgv(rawArgv: string[]): ScannedArgv {
  const scanned: ScannedArgv = { values: new Map(), unknown: [], args: [], help: false }

  const takeValue = (index: number): string | undefined => {
    const next = rawArgv[index + 1]
    return next !== undefined && !next.startsWith('-') ? next : undefined
  }

  const record = (flag: FlagDefinition, value: string) => {
    if (flag.command === 'help') {
      scanned.help = true
      return
    }
    const values = scanned.values.get(flag.command) ?? []
    values.push(value)
    scanned.values.set(flag.command, values)
  }

  for (let i = 0; i < rawArgv.length; i++) {
    const token = rawArgv[i]

    if (token === '--') {
      scanned.args.push(...rawArgv.slice(i + 1))
      break
    }

    if (token.startsWith('--')) {
      const eq = token.indexOf('=')
      const name = eq === -1 ? token : token.slice(0, eq)
      const flag = FLAGS.find(def => def.long === name)
      if (!flag) {
        scanned.unknown.push(name)
        continue
      }
      if (!flag.arg) {
        record(flag, '')
        continue
      }
      let value = eq === -1 ? undefined : token.slice(eq + 1)
      if (value === undefined) {
        value = takeValue(i)
        if (value !== undefined)
          i++
      }
      record(flag, value ?? '')
      continue
    }

    if (token.startsWith('-') && token.length > 1) {
      // bundled short flags, e.g. -lV or -sname
      for (let j = 1; j < token.length; j++) {
        const short = `-${token[j]}`
        const flag = FLAGS.find(def => def.short === short)
        if (!flag) {
          scanned.unknown.push(short)
          continue
        }
        if (!flag.arg) {
          record(flag, '')
          continue
        }
        let value: string | undefined = token.slice(j + 1) || undefined
        if (value === undefined) {
          value = takeValue(i)
          if (value !== undefined)
            i++
        }
        record(flag, value ?? '')
        break
      }
      continue
    }

    scanned.args.push(token)
  }

  return scanned
}

function runCompletion(flag: string | undefined, deps: CLIDependencies): number {
  try {
    for (const candidate of completionsFor(flag, deps.manager))
      console.log(candidate)
    return 0
  }
  catch (error) {
    // stay quiet on the shell's completion line
    logVerbose(`completion failed: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}

export async function runCLI(rawArgv: string[], deps: CLIDependencies): Promise<number> {
  if (rawArgv[0] === '--complete')
    return runCompletion(rawArgv[1], deps)

  const cli = createCLI()
  const scanned = scanArgv(rawArgv)

  if (scanned.unknown.length > 0) {
    for (const option of scanned.unknown)
      logError(`unknown option: ${option}`)
    return 1
  }

  if (scanned.help || scanned.args[0] === 'help') {
    cli.outputHelp()
    return 0
  }

  const requested = FLAGS.filter(flag => scanned.values.has(flag.command))
  if (requested.length === 0) {
    cli.outputHelp()
    return 1
  }

  const counter = new LineCounter()
  for (const flag of requested) {
    const cmd = await resolveCommand(flag.command)
    if (!cmd) {
      logError(`unknown command: ${flag.command}`)
      return 1
    }

    const code = await cmd.run({
      argv: flag.arg ? scanned.values.get(flag.command) ?? [] : [],
      manager: deps.manager,
      host: deps.host,
      counter,
    })
    if (code !== 0)
      return code
  }

  return 0
}
