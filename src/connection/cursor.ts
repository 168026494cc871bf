import { delegateToExecutor, proxyPropertyDirectly, type Dispatched, type Passthrough } from '../bridge/index.js'
import { dispatch, type Executor } from '../executor/index.js'
import type { DriverCursor, SqlParameters } from '../driver/index.js'
import type { Connection } from './connection.js'
import { describeBatch } from './echo.js'

const CURSOR_METHODS = ['fetchone', 'fetchmany', 'fetchall', 'close'] as const
const CURSOR_PROPERTIES = ['description', 'rowcount', 'lastrowid'] as const

type CursorMethod = (typeof CURSOR_METHODS)[number]
type CursorProperty = (typeof CURSOR_PROPERTIES)[number]

/**
 * Promise-returning view of a driver cursor.
 *
 * Fetches, execution and close run on the parent connection's executor;
 * `description`, `rowcount`, `lastrowid` and `arraysize` are read in place.
 * Only meaningful while the parent connection is open.
 */
export class Cursor {
  readonly connection: Connection
  readonly echo: boolean
  private readonly raw: DriverCursor

  constructor(raw: DriverCursor, connection: Connection, echo: boolean) {
    this.raw = raw
    this.connection = connection
    this.echo = echo
  }

  get executor(): Executor {
    return this.connection.executor
  }

  /** Rows per `fetchmany()` call and per async-iteration batch. */
  get arraysize(): number {
    return this.raw.arraysize
  }

  /** @throws RangeError unless `value` is a positive integer */
  set arraysize(value: number) {
    if (!Number.isInteger(value) || value < 1) {
      throw new RangeError(`arraysize must be a positive integer, got ${value}`)
    }
    this.raw.arraysize = value
  }

  protected get handle(): DriverCursor {
    return this.raw
  }

  async execute(sql: string, parameters: SqlParameters = []): Promise<this> {
    if (this.echo) {
      this.connection.diagnostics.info('cursor.execute', { sql, parameters })
    }
    const raw = this.raw
    await dispatch(this.executor, () => raw.execute(sql, parameters))
    return this
  }

  async executemany(sql: string, seqOfParameters: Iterable<SqlParameters>): Promise<this> {
    if (this.echo) {
      this.connection.diagnostics.info('cursor.executemany', { sql, parameters: describeBatch(seqOfParameters) })
    }
    const raw = this.raw
    await dispatch(this.executor, () => raw.executemany(sql, seqOfParameters))
    return this
  }

  async executescript(script: string): Promise<this> {
    if (this.echo) {
      this.connection.diagnostics.info('cursor.executescript', { sql: script })
    }
    const raw = this.raw
    await dispatch(this.executor, () => raw.executescript(script))
    return this
  }

  /** Yields every remaining row, fetching `arraysize` rows per dispatch. */
  async *[Symbol.asyncIterator](): AsyncIterator<unknown> {
    for (;;) {
      const batch = await this.fetchmany(this.arraysize)
      if (batch.length === 0) return
      yield* batch
    }
  }
}

export interface Cursor extends Dispatched<DriverCursor, CursorMethod>, Passthrough<DriverCursor, CursorProperty> {}

delegateToExecutor<DriverCursor>(Cursor, 'handle', CURSOR_METHODS)
proxyPropertyDirectly<DriverCursor>(Cursor, 'handle', CURSOR_PROPERTIES)
