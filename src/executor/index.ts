export { dispatch } from './dispatch.js'
export { WorkerPool, type Executor, type WorkerPoolOptions } from './pool.js'
export { immediateScheduler, type Scheduler } from './scheduler.js'
