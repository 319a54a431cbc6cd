import type { LinkMode, PhpenvConfigOptions } from './types'
import process from 'node:process'
import { loadConfig } from 'bunfig'
import { validateConfig } from './config-validation'

function envFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

function envLinkMode(value: string | undefined): LinkMode {
  return value === 'copy' ? 'copy' : 'symlink'
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PhpenvConfigOptions {
  return {
    // empty values mean "ask phpenv", same as unset
    root: env.PHPENV_ROOT || undefined,
    version: env.PHPENV_VERSION || undefined,
    command: env.PHPENV_CONFIG_HOST_COMMAND || 'phpenv',
    systemVersion: 'system',
    linkMode: envLinkMode(env.PHPENV_CONFIG_LINK_MODE),
    verbose: envFlag(env.PHPENV_CONFIG_VERBOSE),
  }
}

export const defaultConfig: PhpenvConfigOptions = configFromEnv()

/**
 * Resolve the effective configuration: environment defaults overlaid with a
 * `phpenv-config.config.*` file when one exists.
 */
export async function loadPhpenvConfig(cwd: string = process.cwd()): Promise<PhpenvConfigOptions> {
  const config = await loadConfig<PhpenvConfigOptions>({
    name: 'phpenv-config',
    cwd,
    defaultConfig,
  })

  const validation = validateConfig(config)
  for (const warning of validation.warnings) {
    console.warn(`⚠️  ${warning}`)
  }
  if (!validation.valid) {
    throw new Error(`invalid configuration: ${validation.errors.join('; ')}`)
  }

  return config
}
