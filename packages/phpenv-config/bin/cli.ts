#!/usr/bin/env -S node --import tsx
import process from 'node:process'
import { runCLI } from '../src/cli/router'
import { loadPhpenvConfig } from '../src/config'
import { ShellPhpenvHost } from '../src/host'
import { logError, setVerbose } from '../src/logging'
import { FragmentManager } from '../src/manager'

async function main(): Promise<number> {
  const config = await loadPhpenvConfig()
  setVerbose(config.verbose)

  const host = new ShellPhpenvHost(config)
  const manager = new FragmentManager(host, config)
  return runCLI(process.argv.slice(2), { host, manager })
}

try {
  process.exit(await main())
}
catch (error) {
  logError(error instanceof Error ? error.message : String(error))
  process.exit(1)
}
