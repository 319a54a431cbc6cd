export type FragmentKind = 'cfg' | 'ext'

export type LinkMode = 'symlink' | 'copy'

export interface PhpenvConfigOptions {
  /** phpenv installation root. Asked from the host command when unset. */
  root?: string
  /** Active PHP version. Asked from the host command when unset. */
  version?: string
  /** Executable used to query phpenv */
  command: string
  /** Version name phpenv reports when no managed PHP is selected */
  systemVersion: string
  /**
   * How fragments end up in the enabled directory.
   * - 'symlink' (default): link into conf.d-available
   * - 'copy': copy the file, for file systems without symlinks
   */
  linkMode: LinkMode
  verbose: boolean
}

export interface ManagedPaths {
  root: string
  version: string
  available: string
  enabled: string
}

export interface FragmentList {
  enabled: string[]
  disabled: string[]
}
