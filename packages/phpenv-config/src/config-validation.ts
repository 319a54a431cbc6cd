import type { PhpenvConfigOptions } from './types'
import path from 'node:path'

export interface ValidationResult {
  valid: boolean
  errors: string[]
  warnings: string[]
}

const LINK_MODES = ['symlink', 'copy']

/**
 * Validates a loaded PhpenvConfigOptions object
 */
export function validateConfig(config: Partial<PhpenvConfigOptions>): ValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  if (config.linkMode !== undefined && !LINK_MODES.includes(config.linkMode)) {
    errors.push(`linkMode must be one of ${LINK_MODES.join(', ')}`)
  }

  if (config.command !== undefined && config.command.trim() === '') {
    errors.push('command must not be empty')
  }

  if (config.systemVersion !== undefined && config.systemVersion.trim() === '') {
    errors.push('systemVersion must not be empty')
  }

  if (config.root && !path.isAbsolute(config.root)) {
    warnings.push(`root '${config.root}' is relative and depends on the working directory`)
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
