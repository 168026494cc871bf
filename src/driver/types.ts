/** Values SQLite can bind and return. */
export type SqlValue = null | number | bigint | string | Uint8Array

/** Positional (`?`) or named (`:name`, `@name`, `$name`) parameters. */
export type SqlParameters = readonly SqlValue[] | Readonly<Record<string, SqlValue>>

/** `null` means autocommit; any string is the BEGIN mode used for implicit transactions. */
export type IsolationLevel = '' | 'DEFERRED' | 'IMMEDIATE' | 'EXCLUSIVE' | null

export interface ColumnDescription {
  name: string
  /** Declared column type, `null` for expressions. */
  type: string | null
}

/** Receives the cursor and the row's values (after `textFactory`); its result is what fetches return. */
export type RowFactory = (cursor: DriverCursor, row: unknown[]) => unknown
export type TextFactory = (value: string) => unknown
export type SqlFunction = (...args: SqlValue[]) => SqlValue
export type Collation = (a: string, b: string) => number
export type TraceCallback = (statement: string) => void
export type AuthorizerCallback = (
  action: number,
  arg1: string | null,
  arg2: string | null,
  database: string | null,
  trigger: string | null,
) => number
export type ProgressHandler = () => number | boolean | void

/** Per-group state of a user-defined aggregate. */
export interface Aggregate {
  step(...args: SqlValue[]): void
  finalize(): SqlValue
}

export type AggregateFactory = () => Aggregate

export interface FunctionOptions {
  deterministic?: boolean
}

/** Options passed to `Driver.open`. */
export interface DriverOpenOptions {
  /** Seconds to wait on a locked database before failing. */
  timeout: number
  isolationLevel: IsolationLevel
  readonly: boolean
  fileMustExist: boolean
  safeIntegers: boolean
}

/**
 * Blocking cursor over one statement's results.
 */
export interface DriverCursor {
  readonly connection: DriverConnection
  readonly description: ColumnDescription[] | null
  /** Rows changed by the last write, `-1` after a read. */
  readonly rowcount: number
  readonly lastrowid: number | bigint | null
  arraysize: number
  rowFactory: RowFactory | null

  execute(sql: string, parameters?: SqlParameters): DriverCursor
  executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): DriverCursor
  executescript(script: string): DriverCursor
  fetchone(): unknown
  fetchmany(size?: number): unknown[]
  fetchall(): unknown[]
  close(): void
}

/**
 * Blocking connection handle. Nothing here is safe to call from two places
 * at once.
 */
export interface DriverConnection {
  readonly inTransaction: boolean
  readonly totalChanges: number
  isolationLevel: IsolationLevel
  rowFactory: RowFactory | null
  textFactory: TextFactory

  execute(sql: string, parameters?: SqlParameters): DriverCursor
  executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): DriverCursor
  executescript(script: string): DriverCursor
  cursor(): DriverCursor
  commit(): void
  rollback(): void
  createFunction(name: string, narg: number, fn: SqlFunction, options?: FunctionOptions): void
  createAggregate(name: string, narg: number, factory: AggregateFactory): void
  createCollation(name: string, compare: Collation | null): void
  interrupt(): void
  setAuthorizer(callback: AuthorizerCallback | null): void
  setProgressHandler(handler: ProgressHandler | null, instructions: number): void
  setTraceCallback(callback: TraceCallback | null): void
  enableLoadExtension(enabled: boolean): void
  loadExtension(path: string): void
  iterdump(): string[]
  close(): void
}

/** Opens blocking connection handles. */
export interface Driver {
  open(database: string, options: DriverOpenOptions): DriverConnection
}
