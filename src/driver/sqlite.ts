import Database from 'better-sqlite3'
import { dumpDatabase } from './dump.js'
import { NotSupportedError, OperationalError, ProgrammingError } from './errors.js'
import type {
  AggregateFactory,
  Aggregate,
  Collation,
  ColumnDescription,
  Driver,
  DriverConnection,
  DriverCursor,
  DriverOpenOptions,
  FunctionOptions,
  IsolationLevel,
  RowFactory,
  SqlFunction,
  SqlParameters,
  SqlValue,
  TextFactory,
  TraceCallback,
} from './types.js'

const ISOLATION_LEVELS: readonly IsolationLevel[] = ['', 'DEFERRED', 'IMMEDIATE', 'EXCLUSIVE']

// Statements that open an implicit transaction when one is not already active.
// Leading whitespace and comments are skipped.
const IMPLICIT_BEGIN = /^(?:\s|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/)*(?:INSERT|UPDATE|DELETE|REPLACE)\b/i

const identityText: TextFactory = (value) => value

/**
 * Validate and normalize an isolation level. `null` selects autocommit.
 */
export function checkIsolationLevel(value: string | null): IsolationLevel {
  if (value === null) return null
  const upper = value.toUpperCase()
  const level = ISOLATION_LEVELS.find((candidate) => candidate === upper)
  if (level === undefined) {
    throw new ProgrammingError(
      `Invalid isolation level "${value}": expected one of "", DEFERRED, IMMEDIATE, EXCLUSIVE or null`,
    )
  }
  return level
}

export function isSqlValue(value: unknown): value is SqlValue {
  return (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof Uint8Array
  )
}

function toSqlValues(values: readonly unknown[]): SqlValue[] {
  return values.map((value) => {
    if (!isSqlValue(value)) {
      throw new ProgrammingError(`Unsupported SQLite value of type ${typeof value}`)
    }
    return value
  })
}

function isPositional(parameters: SqlParameters): parameters is readonly SqlValue[] {
  return Array.isArray(parameters)
}

// better-sqlite3 takes positional values spread, named values as one object
function bindArgs(parameters: SqlParameters): unknown[] {
  return isPositional(parameters) ? [...parameters] : [parameters]
}

function withArity<F extends (...args: never[]) => unknown>(fn: F, arity: number): F {
  Object.defineProperty(fn, 'length', { value: arity })
  return fn
}

/**
 * Connection handle over better-sqlite3 with DB-API style transaction
 * handling: unless the isolation level is `null`, the first data-modifying
 * statement opens a transaction that stays open until commit or rollback.
 *
 * Not safe for concurrent use; callers serialize access.
 */
export class SqliteConnection implements DriverConnection {
  rowFactory: RowFactory | null = null
  textFactory: TextFactory = identityText
  private level: IsolationLevel
  private readonly db: Database.Database
  private traceCallback: TraceCallback | null = null
  private extensionsEnabled = false

  /**
   * @param database - File path, or ':memory:' for an in-memory database
   */
  constructor(database: string, options: DriverOpenOptions) {
    this.level = checkIsolationLevel(options.isolationLevel)
    this.db = new Database(database, {
      readonly: options.readonly,
      fileMustExist: options.fileMustExist,
      timeout: Math.round(options.timeout * 1000),
      verbose: (message?: unknown) => this.traceCallback?.(String(message)),
    })
    if (options.safeIntegers) {
      this.db.defaultSafeIntegers(true)
    }
  }

  get isOpen(): boolean {
    return this.db.open
  }

  get inTransaction(): boolean {
    this.ensureOpen()
    return this.db.inTransaction
  }

  get totalChanges(): number {
    this.ensureOpen()
    return Number(this.db.prepare('SELECT total_changes()').pluck().get())
  }

  get isolationLevel(): IsolationLevel {
    return this.level
  }

  /** Switching to `null` (autocommit) commits a pending transaction. */
  set isolationLevel(value: IsolationLevel) {
    this.ensureOpen()
    const level = checkIsolationLevel(value)
    if (level === null && this.db.inTransaction) {
      this.db.exec('COMMIT')
    }
    this.level = level
  }

  execute(sql: string, parameters: SqlParameters = []): SqliteCursor {
    return this.cursor().execute(sql, parameters)
  }

  executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): SqliteCursor {
    return this.cursor().executemany(sql, seqOfParameters)
  }

  executescript(script: string): SqliteCursor {
    return this.cursor().executescript(script)
  }

  cursor(): SqliteCursor {
    this.ensureOpen()
    return new SqliteCursor(this)
  }

  commit(): void {
    this.ensureOpen()
    if (this.db.inTransaction) this.db.exec('COMMIT')
  }

  rollback(): void {
    this.ensureOpen()
    if (this.db.inTransaction) this.db.exec('ROLLBACK')
  }

  /**
   * Register a scalar SQL function. A negative `narg` accepts any number of
   * arguments.
   */
  createFunction(name: string, narg: number, fn: SqlFunction, options: FunctionOptions = {}): void {
    this.ensureOpen()
    const call = (...args: unknown[]): SqlValue => fn(...toSqlValues(args))
    const deterministic = options.deterministic ?? false
    if (narg < 0) {
      this.db.function(name, { varargs: true, deterministic }, call)
    } else {
      this.db.function(name, { deterministic }, withArity(call, narg))
    }
  }

  /**
   * Register an aggregate. `factory` is called once per group; the returned
   * object receives every row through `step` and produces the value with
   * `finalize`.
   */
  createAggregate(name: string, narg: number, factory: AggregateFactory): void {
    this.ensureOpen()
    const step = (state: Aggregate, ...args: unknown[]): void => {
      state.step(...toSqlValues(args))
    }
    this.db.aggregate<Aggregate>(name, {
      varargs: narg < 0,
      start: () => factory(),
      step: narg < 0 ? step : withArity(step, narg + 1),
      result: (state: Aggregate) => state.finalize(),
    })
  }

  createCollation(name: string, _compare: Collation | null): void {
    this.ensureOpen()
    throw new NotSupportedError(`Cannot create collation "${name}": better-sqlite3 has no collation hook`)
  }

  interrupt(): void {
    this.ensureOpen()
    throw new NotSupportedError('interrupt is not available in better-sqlite3')
  }

  setAuthorizer(): void {
    this.ensureOpen()
    throw new NotSupportedError('setAuthorizer is not available in better-sqlite3')
  }

  setProgressHandler(): void {
    this.ensureOpen()
    throw new NotSupportedError('setProgressHandler is not available in better-sqlite3')
  }

  /** The callback receives each SQL statement as it runs; `null` removes it. */
  setTraceCallback(callback: TraceCallback | null): void {
    this.ensureOpen()
    this.traceCallback = callback
  }

  enableLoadExtension(enabled: boolean): void {
    this.ensureOpen()
    this.extensionsEnabled = enabled
  }

  loadExtension(path: string): void {
    this.ensureOpen()
    if (!this.extensionsEnabled) {
      throw new OperationalError('not authorized')
    }
    this.db.loadExtension(path)
  }

  iterdump(): string[] {
    this.ensureOpen()
    return dumpDatabase(this.db)
  }

  /** Uncommitted changes are discarded. Closing twice is a no-op. */
  close(): void {
    if (!this.db.open) return
    this.db.close()
  }

  /** @internal */
  prepare(sql: string): Database.Statement<unknown[], unknown> {
    return this.db.prepare(sql)
  }

  /**
   * @internal Opens the implicit transaction for data-modifying statements,
   * including those that return rows (`INSERT ... RETURNING`).
   */
  beginImplicit(statement: Database.Statement): void {
    if (
      this.level !== null &&
      !this.db.inTransaction &&
      !statement.readonly &&
      IMPLICIT_BEGIN.test(statement.source)
    ) {
      this.db.exec(`BEGIN ${this.level}`)
    }
  }

  /** @internal Scripts run in autocommit: a pending transaction is committed first. */
  runScript(script: string): void {
    if (this.db.inTransaction) this.db.exec('COMMIT')
    this.db.exec(script)
  }

  /** @internal */
  ensureOpen(): void {
    if (!this.db.open) {
      throw new ProgrammingError('Cannot operate on a closed database.')
    }
  }
}

/**
 * Cursor over a better-sqlite3 statement. Reader statements are fully
 * buffered when executed, so fetching never holds the connection busy.
 */
export class SqliteCursor implements DriverCursor {
  arraysize = 1
  rowFactory: RowFactory | null
  readonly connection: SqliteConnection
  private columns: ColumnDescription[] | null = null
  private changes = -1
  private insertId: number | bigint | null = null
  private rows: SqlValue[][] = []
  private position = 0
  private closed = false

  constructor(connection: SqliteConnection) {
    this.connection = connection
    this.rowFactory = connection.rowFactory
  }

  get description(): ColumnDescription[] | null {
    return this.columns
  }

  get rowcount(): number {
    return this.changes
  }

  get lastrowid(): number | bigint | null {
    return this.insertId
  }

  execute(sql: string, parameters: SqlParameters = []): this {
    this.check()
    this.reset()
    const statement = this.connection.prepare(sql)
    this.connection.beginImplicit(statement)
    if (statement.reader) {
      this.columns = statement.columns().map((column) => ({ name: column.name, type: column.type }))
      this.rows = statement
        .raw(true)
        .all(...bindArgs(parameters))
        .map(toRow)
    } else {
      const result = statement.run(...bindArgs(parameters))
      this.changes = result.changes
      this.insertId = result.lastInsertRowid
    }
    return this
  }

  executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): this {
    this.check()
    this.reset()
    const statement = this.connection.prepare(sql)
    if (statement.reader) {
      throw new ProgrammingError('executemany() can only execute DML statements.')
    }
    this.connection.beginImplicit(statement)
    let total = 0
    for (const parameters of seqOfParameters) {
      const result = statement.run(...bindArgs(parameters))
      total += result.changes
      this.insertId = result.lastInsertRowid
    }
    this.changes = total
    return this
  }

  executescript(script: string): this {
    this.check()
    this.reset()
    this.connection.runScript(script)
    return this
  }

  /** Next row, or `undefined` once the result set is exhausted. */
  fetchone(): unknown {
    this.check()
    if (this.position >= this.rows.length) return undefined
    const row = this.rows[this.position]
    this.position++
    return this.materialize(row)
  }

  fetchmany(size: number = this.arraysize): unknown[] {
    this.check()
    const batch = this.rows.slice(this.position, this.position + Math.max(0, size))
    this.position += batch.length
    return batch.map((row) => this.materialize(row))
  }

  fetchall(): unknown[] {
    this.check()
    const rest = this.rows.slice(this.position)
    this.position = this.rows.length
    return rest.map((row) => this.materialize(row))
  }

  close(): void {
    this.closed = true
    this.rows = []
    this.position = 0
  }

  private materialize(row: SqlValue[]): unknown {
    const textFactory = this.connection.textFactory
    const values = row.map((value) => (typeof value === 'string' ? textFactory(value) : value))
    return this.rowFactory ? this.rowFactory(this, values) : values
  }

  private reset(): void {
    this.columns = null
    this.changes = -1
    this.rows = []
    this.position = 0
  }

  private check(): void {
    if (this.closed) {
      throw new ProgrammingError('Cannot operate on a closed cursor.')
    }
    this.connection.ensureOpen()
  }
}

function toRow(row: unknown): SqlValue[] {
  if (!Array.isArray(row)) {
    throw new TypeError('Expected a raw row array')
  }
  return toSqlValues(row)
}

/** Opens better-sqlite3 handles. */
export const sqliteDriver: Driver = {
  open(database: string, options: DriverOpenOptions): SqliteConnection {
    return new SqliteConnection(database, options)
  },
}
