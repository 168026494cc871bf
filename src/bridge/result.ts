import { UsageError } from './errors.js'

export interface PendingResultOptions<S, T> {
  /** Applied to the settled value before it reaches the caller. */
  transform: (value: S) => T
  /** Called once when a `use()` scope exits, on every path. */
  release?: (resource: T) => unknown
  /** Receives a release failure that would otherwise hide the scope's own error. */
  onReleaseError?: (error: unknown) => void
}

/**
 * One dispatched operation, consumable exactly once in either of two ways:
 *
 *     const cursor = await conn.execute(sql)
 *
 *     await conn.execute(sql).use(async (cursor) => { ... })
 *
 * Both resolve the same promise and apply the same transform. The second form
 * also releases the resource when the callback returns or throws.
 */
export class PendingResult<S, T = S> implements PromiseLike<T> {
  private consumed = false
  private readonly pending: Promise<S>
  private readonly options: PendingResultOptions<S, T>

  constructor(pending: Promise<S>, options: PendingResultOptions<S, T>) {
    this.pending = pending
    this.options = options
  }

  /** Wrap a promise whose value needs no transform. */
  static of<T>(pending: Promise<T>, release?: (resource: T) => unknown): PendingResult<T, T> {
    return new PendingResult<T, T>(pending, { transform: (value) => value, release })
  }

  get isConsumed(): boolean {
    return this.consumed
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.settle().then(onfulfilled, onrejected)
  }

  /**
   * Resolve the result, hand it to `body`, then release it.
   *
   * A release failure after a failed body goes to `onReleaseError` and the
   * body's error is rethrown; after a successful body it rejects this call.
   */
  async use<R>(body: (resource: T) => R | PromiseLike<R>): Promise<R> {
    const resource = await this.settle()

    let result: R
    try {
      result = await body(resource)
    } catch (err) {
      await this.releaseAfterFailure(resource)
      throw err
    }

    await this.release(resource)
    return result
  }

  private settle(): Promise<T> {
    if (this.consumed) {
      return Promise.reject(
        new UsageError('ALREADY_CONSUMED', 'This result has already been awaited or used'),
      )
    }
    this.consumed = true
    return this.pending.then(this.options.transform)
  }

  private async release(resource: T): Promise<void> {
    if (this.options.release) {
      await this.options.release(resource)
    }
  }

  private async releaseAfterFailure(resource: T): Promise<void> {
    try {
      await this.release(resource)
    } catch (releaseErr) {
      this.options.onReleaseError?.(releaseErr)
    }
  }
}
