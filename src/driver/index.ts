export type {
  Aggregate,
  AggregateFactory,
  AuthorizerCallback,
  Collation,
  ColumnDescription,
  Driver,
  DriverConnection,
  DriverCursor,
  DriverOpenOptions,
  FunctionOptions,
  IsolationLevel,
  ProgressHandler,
  RowFactory,
  SqlFunction,
  SqlParameters,
  SqlValue,
  TextFactory,
  TraceCallback,
} from './types.js'
export { DriverError, NotSupportedError, OperationalError, ProgrammingError, type DriverErrorCode } from './errors.js'
export { SqliteConnection, SqliteCursor, sqliteDriver, checkIsolationLevel, isSqlValue } from './sqlite.js'
export { dumpDatabase } from './dump.js'
