import {
  PendingResult,
  UsageError,
  delegateToExecutor,
  proxyPropertyDirectly,
  type Dispatched,
  type Passthrough,
} from '../bridge/index.js'
import { resolveConnectSettings } from '../config/index.js'
import { Diagnostics, createStreamSink, type DiagnosticsSink } from '../diagnostics/index.js'
import {
  sqliteDriver,
  type Driver,
  type DriverConnection,
  type DriverCursor,
  type DriverOpenOptions,
  type IsolationLevel,
  type RowFactory,
  type SqlParameters,
  type TextFactory,
} from '../driver/index.js'
import { WorkerPool, dispatch, immediateScheduler, type Executor, type Scheduler } from '../executor/index.js'
import type { ConnectSettings } from '../types/config.js'
import { Cursor } from './cursor.js'
import { describeBatch } from './echo.js'

const CONNECTION_METHODS = [
  'commit',
  'rollback',
  'createFunction',
  'createAggregate',
  'createCollation',
  'interrupt',
  'setAuthorizer',
  'setProgressHandler',
  'setTraceCallback',
  'enableLoadExtension',
  'loadExtension',
  'iterdump',
] as const

const CONNECTION_PROPERTIES = ['inTransaction', 'totalChanges'] as const

type ConnectionMethod = (typeof CONNECTION_METHODS)[number]
type ConnectionProperty = (typeof CONNECTION_PROPERTIES)[number]

export type ConnectionState = 'unconnected' | 'connecting' | 'open' | 'closing' | 'closed'

/** Construction options. Scalar settings are validated; collaborators are taken as given. */
export interface ConnectionOptions extends Partial<Omit<ConnectSettings, 'checkSameThread'>> {
  /** Must be false (or omitted): handles are called from executor tasks, not the caller. */
  checkSameThread?: boolean
  /** Runs every blocking handle call. Defaults to a private WorkerPool. */
  executor?: Executor
  scheduler?: Scheduler
  driver?: Driver
  /** Receives diagnostics; stderr JSON lines by default. */
  sink?: DiagnosticsSink
}

/** Resolves to a cursor; `use()` closes the cursor when the scope exits. */
export type CursorResult = PendingResult<DriverCursor, Cursor>

/**
 * Promise-based connection over a blocking driver handle.
 *
 * Every call that touches the handle is dispatched to the executor and
 * returns a promise (or a CursorResult) without waiting. Settings and state
 * reads (`isolationLevel`, `rowFactory`, `textFactory`, `inTransaction`,
 * `totalChanges`) go straight to the handle.
 *
 * Calls are not queued per connection: await one operation before issuing
 * the next on the same connection.
 */
export class Connection {
  readonly database: string
  readonly executor: Executor
  readonly scheduler: Scheduler
  readonly diagnostics: Diagnostics
  private readonly driver: Driver
  private readonly settings: ConnectSettings
  private conn: DriverConnection | null = null
  private current: ConnectionState = 'unconnected'
  private closing: Promise<void> | null = null

  /**
   * @param database - File path, or ':memory:'
   * @throws UsageError when `checkSameThread` is anything but false
   * @throws ConfigError when a setting is out of range
   */
  constructor(database: string, options: ConnectionOptions = {}) {
    if (options.checkSameThread !== undefined && options.checkSameThread !== false) {
      throw new UsageError(
        'THREAD_AFFINITY',
        `checkSameThread must be false, got ${String(options.checkSameThread)}`,
      )
    }
    this.settings = resolveConnectSettings(options)
    this.database = database
    this.scheduler = options.scheduler ?? immediateScheduler
    this.executor = options.executor ?? new WorkerPool({ scheduler: this.scheduler })
    this.driver = options.driver ?? sqliteDriver
    this.diagnostics = new Diagnostics(options.sink ?? createStreamSink())
  }

  get state(): ConnectionState {
    return this.current
  }

  get closed(): boolean {
    return this.conn === null
  }

  get echo(): boolean {
    return this.settings.echo
  }

  /** Lock timeout in seconds. */
  get timeout(): number {
    return this.settings.timeout
  }

  get autocommit(): boolean {
    return this.handle.isolationLevel === null
  }

  get isolationLevel(): IsolationLevel {
    return this.handle.isolationLevel
  }

  set isolationLevel(value: IsolationLevel) {
    this.handle.isolationLevel = value
  }

  get rowFactory(): RowFactory | null {
    return this.handle.rowFactory
  }

  set rowFactory(value: RowFactory | null) {
    this.handle.rowFactory = value
  }

  get textFactory(): TextFactory {
    return this.handle.textFactory
  }

  set textFactory(value: TextFactory) {
    this.handle.textFactory = value
  }

  /** The open driver handle. Throws instead of dispatching unless the state is `open`. */
  protected get handle(): DriverConnection {
    if (this.conn === null || this.current !== 'open') {
      throw new UsageError('NOT_OPEN', `Connection to "${this.database}" is not open (state: ${this.current})`)
    }
    return this.conn
  }

  /**
   * Open the driver handle on the executor.
   *
   * Allowed from `unconnected` and `closed`. On failure the previous state is
   * kept and the driver's error is rethrown as is.
   */
  connect(): Promise<this> {
    if (this.current !== 'unconnected' && this.current !== 'closed') {
      throw new UsageError('INVALID_STATE', `Cannot connect while ${this.current}`)
    }
    return this.open(this.current)
  }

  /**
   * Close the driver handle on the executor. The handle is dropped and the
   * state becomes `closed` whatever the outcome; a close failure still
   * rejects. Resolves immediately when there is nothing to close.
   */
  close(): Promise<void> {
    if (this.current === 'connecting') {
      throw new UsageError('INVALID_STATE', 'Cannot close while connecting')
    }
    if (this.current === 'closing' && this.closing) {
      return this.closing
    }
    if (this.conn === null) {
      return Promise.resolve()
    }
    this.closing = this.shutdown(this.conn)
    return this.closing
  }

  cursor(): CursorResult {
    const conn = this.handle
    return this.wrapCursor(dispatch(this.executor, () => conn.cursor()))
  }

  /** Run one statement; resolves to a cursor positioned before its first row. */
  execute(sql: string, parameters: SqlParameters = []): CursorResult {
    const conn = this.handle
    if (this.echo) {
      this.diagnostics.info('connection.execute', { sql, parameters })
    }
    return this.wrapCursor(dispatch(this.executor, () => conn.execute(sql, parameters)))
  }

  executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): CursorResult {
    const conn = this.handle
    if (this.echo) {
      this.diagnostics.info('connection.executemany', { sql, parameters: describeBatch(seqOfParameters) })
    }
    return this.wrapCursor(dispatch(this.executor, () => conn.executemany(sql, seqOfParameters)))
  }

  /** Commits any pending transaction, then runs the script. */
  executescript(script: string): CursorResult {
    const conn = this.handle
    if (this.echo) {
      this.diagnostics.info('connection.executescript', { sql: script })
    }
    return this.wrapCursor(dispatch(this.executor, () => conn.executescript(script)))
  }

  private async open(previous: ConnectionState): Promise<this> {
    this.current = 'connecting'
    const { driver, database } = this
    const options: DriverOpenOptions = {
      timeout: this.settings.timeout,
      isolationLevel: this.settings.isolationLevel,
      readonly: this.settings.readonly,
      fileMustExist: this.settings.fileMustExist,
      safeIntegers: this.settings.safeIntegers,
    }

    let conn: DriverConnection
    try {
      conn = await dispatch(this.executor, () => driver.open(database, options))
    } catch (err) {
      this.current = previous
      if (this.echo) this.diagnostics.debug('connect', { database, ok: false, error: err })
      throw err
    }

    this.conn = conn
    this.current = 'open'
    if (this.echo) this.diagnostics.debug('connect', { database, ok: true })
    return this
  }

  private async shutdown(conn: DriverConnection): Promise<void> {
    this.current = 'closing'
    try {
      await dispatch(this.executor, () => conn.close())
      if (this.echo) this.diagnostics.debug('close', { database: this.database, ok: true })
    } catch (err) {
      if (this.echo) this.diagnostics.debug('close', { database: this.database, ok: false, error: err })
      throw err
    } finally {
      this.conn = null
      this.current = 'closed'
      this.closing = null
    }
  }

  private wrapCursor(pending: Promise<DriverCursor>): CursorResult {
    return new PendingResult(pending, {
      transform: (raw: DriverCursor) => new Cursor(raw, this, this.echo),
      release: (cursor: Cursor) => cursor.close(),
      onReleaseError: (error: unknown) => this.diagnostics.warn('cursor.release_failed', { error }),
    })
  }
}

export interface Connection
  extends Dispatched<DriverConnection, ConnectionMethod>,
    Passthrough<DriverConnection, ConnectionProperty> {}

delegateToExecutor<DriverConnection>(Connection, 'handle', CONNECTION_METHODS)
proxyPropertyDirectly<DriverConnection>(Connection, 'handle', CONNECTION_PROPERTIES)
