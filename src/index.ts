export { connect, Connection, Cursor, type ConnectionOptions, type ConnectionState, type CursorResult } from './connection/index.js'
export {
  PendingResult,
  UsageError,
  delegateToExecutor,
  proxyPropertyDirectly,
  type DelegationOwner,
  type Dispatched,
  type MethodKeys,
  type Passthrough,
  type PendingResultOptions,
  type UsageErrorCode,
} from './bridge/index.js'
export { dispatch, WorkerPool, immediateScheduler, type Executor, type Scheduler, type WorkerPoolOptions } from './executor/index.js'
export {
  DriverError,
  NotSupportedError,
  OperationalError,
  ProgrammingError,
  SqliteConnection,
  SqliteCursor,
  sqliteDriver,
  type Aggregate,
  type AggregateFactory,
  type ColumnDescription,
  type Driver,
  type DriverConnection,
  type DriverCursor,
  type DriverOpenOptions,
  type IsolationLevel,
  type RowFactory,
  type SqlFunction,
  type SqlParameters,
  type SqlValue,
  type TextFactory,
} from './driver/index.js'
export {
  Diagnostics,
  createFileSink,
  createStreamSink,
  type DiagnosticEntry,
  type DiagnosticLevel,
  type DiagnosticsSink,
} from './diagnostics/index.js'
export { ConfigError, loadConfig, resolveConnectSettings, DEFAULT_CONFIG } from './config/index.js'
export type { ConnectSettings, RelayConfig } from './types/index.js'
