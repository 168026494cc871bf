import { availableParallelism } from 'node:os'
import { UsageError } from '../bridge/errors.js'
import { immediateScheduler, type Scheduler } from './scheduler.js'

/**
 * Anything that can run a blocking task away from the caller's call stack.
 *
 * `submit` must return before `task` starts. The returned promise settles
 * with the task's return value, or rejects with the exact value it threw.
 */
export interface Executor {
  submit<T>(task: () => T): Promise<T>
}

export interface WorkerPoolOptions {
  /** Upper bound on tasks in flight. Defaults to the host's available parallelism. */
  maxWorkers?: number
  scheduler?: Scheduler
}

/**
 * Bounded FIFO executor.
 *
 * Queued tasks start on a later scheduler turn, never inside `submit`, and at
 * most `maxWorkers` of them are in flight at once. Submission order is start
 * order; completion order is only guaranteed when `maxWorkers` is 1.
 */
export class WorkerPool implements Executor {
  readonly maxWorkers: number
  private readonly scheduler: Scheduler
  private readonly queue: Array<() => void> = []
  private running = 0
  private closed = false
  private drainWaiters: Array<() => void> = []

  constructor(options: WorkerPoolOptions = {}) {
    const maxWorkers = options.maxWorkers ?? availableParallelism()
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`)
    }
    this.maxWorkers = maxWorkers
    this.scheduler = options.scheduler ?? immediateScheduler
  }

  /** Queued plus running tasks. */
  get pending(): number {
    return this.queue.length + this.running
  }

  get isShutdown(): boolean {
    return this.closed
  }

  submit<T>(task: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new UsageError('POOL_SHUT_DOWN', 'Cannot submit work to a worker pool after shutdown'),
      )
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        try {
          resolve(task())
        } catch (err) {
          reject(err)
        }
      })
      this.fill()
    })
  }

  /**
   * Refuse new submissions and resolve once queued and running tasks finish.
   * Calling it again returns a promise for the same drain.
   */
  shutdown(): Promise<void> {
    this.closed = true
    if (this.pending === 0) return Promise.resolve()
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve)
    })
  }

  private fill(): void {
    while (this.running < this.maxWorkers) {
      const job = this.queue.shift()
      if (!job) return
      this.running++
      this.scheduler.schedule(() => {
        try {
          job()
        } finally {
          this.running--
          this.fill()
          this.notifyDrained()
        }
      })
    }
  }

  private notifyDrained(): void {
    if (this.pending > 0 || this.drainWaiters.length === 0) return
    const waiters = this.drainWaiters
    this.drainWaiters = []
    for (const resolve of waiters) resolve()
  }
}
