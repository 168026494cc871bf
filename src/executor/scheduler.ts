/**
 * Event-loop handle used to start work on a later turn.
 *
 * Injected explicitly wherever deferred work is started; nothing in this
 * package looks up a process-wide scheduler.
 */
export interface Scheduler {
  schedule(callback: () => void): void
}

/** Runs callbacks in the check phase of the Node event loop. */
export const immediateScheduler: Scheduler = {
  schedule(callback: () => void): void {
    setImmediate(callback)
  },
}
