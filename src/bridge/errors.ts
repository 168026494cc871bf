/** Typed usage error codes raised at the call site, before anything is dispatched */
export type UsageErrorCode =
  | 'NOT_OPEN'
  | 'INVALID_STATE'
  | 'THREAD_AFFINITY'
  | 'ALREADY_CONSUMED'
  | 'POOL_SHUT_DOWN'

/**
 * Misuse of the bridge itself (wrong connection state, reused result,
 * thread-affine handle). Driver failures are never reported as UsageError.
 */
export class UsageError extends Error {
  readonly code: UsageErrorCode

  constructor(code: UsageErrorCode, message: string) {
    super(message)
    this.name = 'UsageError'
    this.code = code
  }
}
