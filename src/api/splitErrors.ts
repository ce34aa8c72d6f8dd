export type SplitErrorKind =
  | 'network-unavailable'
  | 'server-rejected'
  | 'not-found'
  | 'invariant-violation'

const DEFAULT_MESSAGES: Record<SplitErrorKind, string> = {
  'network-unavailable': 'Network unavailable',
  'server-rejected': 'Server rejected the request',
  'not-found': 'Resource not found',
  'invariant-violation': 'Invariant violation',
}

export class SplitError extends Error {
  readonly kind: SplitErrorKind
  readonly reason?: string

  constructor(kind: SplitErrorKind, reason?: string, options?: { cause?: unknown }) {
    super(reason ? `${DEFAULT_MESSAGES[kind]}: ${reason}` : DEFAULT_MESSAGES[kind], options)
    this.name = 'SplitError'
    this.kind = kind
    this.reason = reason
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: SplitError }

export const success = <T>(value: T): Result<T> => ({ ok: true, value })
export const failure = <T>(error: SplitError): Result<T> => ({ ok: false, error })

export function isSplitError(value: unknown): value is SplitError {
  return value instanceof SplitError
}

function isTransportError(error: unknown): boolean {
  if (error instanceof TypeError) return true
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

/** Wraps anything a backend threw into the split error taxonomy. */
export function toSplitError(error: unknown): SplitError {
  if (isSplitError(error)) {
    return error
  }
  if (isTransportError(error)) {
    return new SplitError('network-unavailable', error instanceof Error ? error.message : undefined, {
      cause: error,
    })
  }
  const reason = error instanceof Error ? error.message : String(error)
  return new SplitError('server-rejected', reason, { cause: error })
}
