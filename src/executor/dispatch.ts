import type { Executor } from './pool.js'

/**
 * Hand a fully bound blocking task to an executor.
 *
 * Returns without running the task. Whatever the task throws comes back as
 * the rejection reason, untouched.
 */
export function dispatch<T>(executor: Executor, task: () => T): Promise<T> {
  return executor.submit(task)
}
