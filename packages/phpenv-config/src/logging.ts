/* eslint-disable no-console */

let verboseLogging = false

export function setVerbose(enabled: boolean): void {
  verboseLogging = enabled
}

export function logSuccess(message: string): void {
  console.log(message)
}

export function logInfo(message: string): void {
  console.log(message)
}

export function logError(message: string): void {
  console.error(`Error: ${message}`)
}

// File-system level detail, only with PHPENV_CONFIG_VERBOSE
export function logVerbose(message: string): void {
  if (verboseLogging)
    console.warn(`  ${message}`)
}
