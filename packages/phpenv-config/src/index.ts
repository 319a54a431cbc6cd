export { runCLI } from './cli/router'
export { configFromEnv, defaultConfig, loadPhpenvConfig } from './config'
export { validateConfig } from './config-validation'
export * from './errors'
export { annotateLines, formatFragmentList, LineCounter } from './format'
export type { PhpenvHost } from './host'
export { managedPaths, ShellPhpenvHost } from './host'
export type { DisableResult } from './manager'
export { FragmentManager } from './manager'
export { fragmentName } from './naming'
export { AvailableStore } from './stores/available-store'
export type { EnabledStore } from './stores/enabled-store'
export { CopyEnabledStore, createEnabledStore, SymlinkEnabledStore } from './stores/enabled-store'
export type * from './types'
export { describeVersion } from './version'
