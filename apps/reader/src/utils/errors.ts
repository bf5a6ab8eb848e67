export const READING_FAILURE_CODES = [
  'already-active',
  'no-active-session',
  'session-not-found',
  'network-unavailable',
  'duplicate',
  'validation',
  'unauthorized',
  'unknown',
] as const

export type ReadingFailureCode = (typeof READING_FAILURE_CODES)[number]

export type ReadingFailure = {
  code: ReadingFailureCode
  message: string
}

export type ReadingResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ReadingFailure }

const DEFAULT_MESSAGES: Record<ReadingFailureCode, string> = {
  'already-active': 'A reading session is already in progress.',
  'no-active-session': 'There is no reading session in progress.',
  'session-not-found': 'The reading session could not be found.',
  'network-unavailable': 'Offline, will sync later.',
  'duplicate': 'This reading session was already recorded.',
  'validation': 'The reading session was rejected.',
  'unauthorized': 'You are signed out. Please sign in again.',
  'unknown': 'Something went wrong.',
}

export function failure(code: ReadingFailureCode, message?: string): ReadingFailure {
  return { code, message: message ?? DEFAULT_MESSAGES[code] }
}

export function ok<T>(value: T): ReadingResult<T> {
  return { ok: true, value }
}

export function fail<T>(code: ReadingFailureCode, message?: string): ReadingResult<T> {
  return { ok: false, failure: failure(code, message) }
}

export class ReadingError extends Error {
  readonly code: ReadingFailureCode
  readonly canTryAgain: boolean

  constructor(code: ReadingFailureCode, message?: string, opts?: { canTryAgain?: boolean; cause?: unknown }) {
    super(message ?? DEFAULT_MESSAGES[code], opts?.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'ReadingError'
    this.code = code
    this.canTryAgain = opts?.canTryAgain ?? code === 'network-unavailable'
  }

  toFailure(): ReadingFailure {
    return { code: this.code, message: this.message }
  }
}

export function toReadingFailure(error: unknown): ReadingFailure {
  if (error instanceof ReadingError) {
    return error.toFailure()
  }
  return failure('unknown', error instanceof Error ? error.message : String(error))
}
