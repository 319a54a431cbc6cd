/**
 * Errors raised by fragment operations
 */

export type FragmentErrorKind =
  | 'MissingArgument'
  | 'InvalidSourcePath'
  | 'InvalidName'
  | 'UnknownFragment'
  | 'AmbiguousFragment'
  | 'AlreadyEnabled'
  | 'UnsupportedVersion'
  | 'HostCommandFailed'

export class FragmentError extends Error {
  readonly kind: FragmentErrorKind

  constructor(kind: FragmentErrorKind, message: string) {
    super(message)
    this.name = 'FragmentError'
    this.kind = kind
  }
}

export function missingArgument(what: string): FragmentError {
  return new FragmentError('MissingArgument', `missing ${what}`)
}

export function invalidSourcePath(sourcePath: string): FragmentError {
  return new FragmentError('InvalidSourcePath', `'${sourcePath}' is not a file`)
}

export function invalidName(name: string): FragmentError {
  return new FragmentError('InvalidName', `'${name}' is not a valid extension name`)
}

export function unknownFragment(name: string): FragmentError {
  return new FragmentError('UnknownFragment', `'${name}' does not exist`)
}

export function ambiguousFragment(name: string, candidates: string[]): FragmentError {
  return new FragmentError('AmbiguousFragment', `'${name}' matches ${candidates.join(' and ')}`)
}

export function alreadyEnabled(name: string): FragmentError {
  return new FragmentError('AlreadyEnabled', `'${name}' is already enabled`)
}

export function unsupportedVersion(version: string): FragmentError {
  return new FragmentError('UnsupportedVersion', `phpenv-config does not manage the '${version}' PHP, select a phpenv version first`)
}

export function hostCommandFailed(command: string, detail: string): FragmentError {
  return new FragmentError('HostCommandFailed', `'${command}' failed: ${detail}`)
}

export function isFragmentError(error: unknown): error is FragmentError {
  return error instanceof FragmentError
}

export function exitCodeFor(error: FragmentError): number {
  switch (error.kind) {
    case 'AlreadyEnabled':
      return 0
    case 'UnsupportedVersion':
      return 255
    default:
      return 1
  }
}
