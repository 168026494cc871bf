import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Connection } from './connection.js'
import { connect } from './connect.js'
import { UsageError } from '../bridge/index.js'
import { ConfigError } from '../config/index.js'
import { WorkerPool } from '../executor/index.js'
import type { Driver } from '../driver/index.js'
import { CountingExecutor, ManualScheduler } from '../../tests/helpers/executors.js'
import { countingDriver, failingCloseDriver } from '../../tests/helpers/drivers.js'
import { createMemorySink } from '../../tests/helpers/sinks.js'

const brokenDriver: Driver = {
  open() {
    throw new Error('unable to open database file')
  },
}

describe('Connection', () => {
  let sink: ReturnType<typeof createMemorySink>

  beforeEach(() => {
    sink = createMemorySink()
  })

  describe('construction', () => {
    it('should start unconnected with no handle', () => {
      const conn = new Connection(':memory:', { sink })
      expect(conn.state).toBe('unconnected')
      expect(conn.closed).toBe(true)
      expect(conn.timeout).toBe(5)
      expect(conn.echo).toBe(false)
    })

    it('should refuse thread affinity before opening anything', () => {
      const driver = countingDriver()
      expect(() => new Connection(':memory:', { checkSameThread: true, driver })).toThrow(
        expect.objectContaining({ name: 'UsageError', code: 'THREAD_AFFINITY' }),
      )
      expect(driver.opened).toBe(0)
    })

    it('should accept checkSameThread set to false', () => {
      expect(() => new Connection(':memory:', { checkSameThread: false, sink })).not.toThrow()
    })

    it('should reject out-of-range settings with a ConfigError', () => {
      expect(() => new Connection(':memory:', { timeout: -1 })).toThrow(ConfigError)
    })

    it('should throw NOT_OPEN synchronously for handle operations before connecting', () => {
      const executor = new CountingExecutor()
      const conn = new Connection(':memory:', { executor, sink })

      expect(() => conn.execute('SELECT 1')).toThrow(UsageError)
      expect(() => conn.commit()).toThrow(/is not open \(state: unconnected\)/)
      expect(() => conn.inTransaction).toThrow(UsageError)
      expect(() => conn.isolationLevel).toThrow(UsageError)
      expect(executor.submissions).toBe(0)
    })
  })

  describe('connect', () => {
    it('should open on the executor and resolve to the connection', async () => {
      const scheduler = new ManualScheduler()
      const driver = countingDriver()
      const conn = new Connection(':memory:', {
        driver,
        executor: new WorkerPool({ maxWorkers: 1, scheduler }),
        sink,
      })

      const opening = conn.connect()
      expect(conn.state).toBe('connecting')
      expect(driver.opened).toBe(0)

      expect(scheduler.runNext()).toBe(true)
      await expect(opening).resolves.toBe(conn)
      expect(driver.opened).toBe(1)
      expect(conn.state).toBe('open')
      expect(conn.closed).toBe(false)

      const closing = conn.close()
      expect(scheduler.runNext()).toBe(true)
      await closing
      expect(conn.state).toBe('closed')
    })

    it('should refuse to connect twice', async () => {
      const conn = new Connection(':memory:', { sink })
      await conn.connect()
      expect(() => conn.connect()).toThrow(expect.objectContaining({ code: 'INVALID_STATE' }))
      await conn.close()
    })

    it('should refuse to close while connecting', async () => {
      const conn = new Connection(':memory:', { sink })
      const opening = conn.connect()
      expect(() => conn.close()).toThrow('Cannot close while connecting')
      await opening
      await conn.close()
    })

    it('should keep the previous state when opening fails', async () => {
      const conn = new Connection(':memory:', { driver: brokenDriver, sink })
      await expect(conn.connect()).rejects.toThrow('unable to open database file')
      expect(conn.state).toBe('unconnected')
      expect(conn.closed).toBe(true)
    })

    it('should reopen after close', async () => {
      const driver = countingDriver()
      const conn = new Connection(':memory:', { driver, sink })
      await conn.connect()
      await conn.close()
      await conn.connect()
      expect(conn.state).toBe('open')
      expect(driver.opened).toBe(2)
      await conn.close()
    })
  })

  describe('close', () => {
    it('should resolve right away when never connected', async () => {
      const conn = new Connection(':memory:', { sink })
      await expect(conn.close()).resolves.toBeUndefined()
      expect(conn.state).toBe('unconnected')
    })

    it('should share one close between concurrent callers', async () => {
      const conn = new Connection(':memory:', { sink })
      await conn.connect()

      const first = conn.close()
      const second = conn.close()
      expect(second).toBe(first)
      expect(conn.state).toBe('closing')
      expect(() => conn.execute('SELECT 1')).toThrow(/is not open \(state: closing\)/)
      await first
      expect(conn.state).toBe('closed')
    })

    it('should drop the handle even when closing fails', async () => {
      const conn = new Connection(':memory:', { driver: failingCloseDriver, sink })
      await conn.connect()

      await expect(conn.close()).rejects.toThrow('close failed')
      expect(conn.closed).toBe(true)
      expect(conn.state).toBe('closed')
    })
  })

  describe('operations', () => {
    let conn: Connection

    beforeEach(async () => {
      conn = await connect(':memory:', { sink })
    })

    afterEach(async () => {
      await conn.close()
    })

    it('should run statements and read results through a scoped cursor', async () => {
      await conn.execute('CREATE TABLE t(x INTEGER)')
      await conn.execute('INSERT INTO t VALUES (?)', [1])
      await conn.commit()

      const rows = await conn.execute('SELECT x FROM t').use((cursor) => cursor.fetchall())
      expect(rows).toEqual([[1]])
    })

    it('should reject with the engine error and stay open', async () => {
      await expect(conn.execute('SELECT * FROM missing')).rejects.toThrow('no such table: missing')
      expect(conn.state).toBe('open')
      await expect(conn.execute('SELECT 1').use((cursor) => cursor.fetchone())).resolves.toEqual([1])
    })

    it('should run executemany and executescript', async () => {
      await conn.executescript('CREATE TABLE t(x INTEGER);')
      const cursor = await conn.executemany('INSERT INTO t VALUES (?)', [[1], [2], [3]])
      expect(cursor.rowcount).toBe(3)
      expect(conn.inTransaction).toBe(true)
      await conn.rollback()
      expect(conn.inTransaction).toBe(false)
    })

    it('should hand out cursors that execute on their own', async () => {
      const cursor = await conn.cursor()
      await cursor.execute('SELECT 1 AS one')
      expect(cursor.description).toEqual([{ name: 'one', type: null }])
      await expect(cursor.fetchone()).resolves.toEqual([1])
    })

    it('should forward isolation level and factories to the handle', async () => {
      expect(conn.autocommit).toBe(false)
      conn.isolationLevel = null
      expect(conn.autocommit).toBe(true)
      expect(conn.isolationLevel).toBeNull()

      conn.textFactory = (value) => `<${value}>`
      await expect(conn.execute("SELECT 'a'").use((cursor) => cursor.fetchone())).resolves.toEqual(['<a>'])

      conn.rowFactory = (_cursor, row) => row.length
      expect(conn.rowFactory).not.toBeNull()
      await expect(conn.execute('SELECT 1, 2').use((cursor) => cursor.fetchone())).resolves.toBe(2)
    })

    it('should dispatch registered functions and dumps through the executor', async () => {
      await conn.createFunction('triple', 1, (value) => (typeof value === 'number' ? value * 3 : null))
      await expect(conn.execute('SELECT triple(2)').use((cursor) => cursor.fetchone())).resolves.toEqual([6])

      await conn.execute('CREATE TABLE t(x)')
      await expect(conn.iterdump()).resolves.toEqual(['BEGIN TRANSACTION;', 'CREATE TABLE t(x);', 'COMMIT;'])
    })

    it('should reject unsupported hooks asynchronously', async () => {
      await expect(conn.interrupt()).rejects.toMatchObject({ name: 'NotSupportedError' })
    })
  })

  describe('dispatch', () => {
    it('should submit every handle method call to the executor', async () => {
      const executor = new CountingExecutor()
      const conn = await connect(':memory:', { executor, sink })
      const afterConnect = executor.submissions

      const committing = conn.commit()
      expect(executor.submissions).toBe(afterConnect + 1)
      await committing

      expect(conn.totalChanges).toBe(0)
      expect(executor.submissions).toBe(afterConnect + 1)
      await conn.close()
    })
  })

  describe('echo', () => {
    it('should log statements and lifecycle events to the sink', async () => {
      const conn = await connect(':memory:', { echo: true, sink })
      await conn.execute('SELECT ?', [1])
      await conn.close()

      expect(sink.entries.map((entry) => [entry.level, entry.event])).toEqual([
        ['debug', 'connect'],
        ['info', 'connection.execute'],
        ['debug', 'close'],
      ])
      expect(sink.entries[1].fields).toEqual({ sql: 'SELECT ?', parameters: [1] })
    })

    it('should log executemany batches as arrays or as an iterable marker', async () => {
      const conn = await connect(':memory:', { echo: true, sink })
      await conn.executescript('CREATE TABLE t(x);')
      await conn.executemany('INSERT INTO t VALUES (?)', [[1], [2]])
      await conn.executemany('INSERT INTO t VALUES (?)', new Set([[3]]))
      await conn.close()

      const batches = sink.entries
        .filter((entry) => entry.event === 'connection.executemany')
        .map((entry) => entry.fields)
      expect(batches).toEqual([
        { sql: 'INSERT INTO t VALUES (?)', parameters: [[1], [2]] },
        { sql: 'INSERT INTO t VALUES (?)', parameters: '<iterable>' },
      ])
    })

    it('should stay silent without echo', async () => {
      const conn = await connect(':memory:', { sink })
      await conn.execute('SELECT 1')
      await conn.close()
      expect(sink.entries).toEqual([])
    })
  })
})

describe('connect', () => {
  it('should close the connection when the scope exits', async () => {
    let inside: Connection | undefined
    const value = await connect(':memory:', { sink: createMemorySink() }).use(async (conn) => {
      inside = conn
      expect(conn.state).toBe('open')
      return 'done'
    })

    expect(value).toBe('done')
    expect(inside?.closed).toBe(true)
    expect(inside?.state).toBe('closed')
  })

  it('should log a close failure that follows a failed scope body', async () => {
    const sink = createMemorySink()

    await expect(
      connect(':memory:', { driver: failingCloseDriver, sink }).use(() => {
        throw new Error('body failed')
      }),
    ).rejects.toThrow('body failed')

    expect(sink.entries).toHaveLength(1)
    expect(sink.entries[0]).toMatchObject({
      level: 'warn',
      event: 'connection.release_failed',
      fields: { error: expect.objectContaining({ message: 'close failed' }) },
    })
  })

  it('should throw on invalid options before dispatching', () => {
    const executor = new CountingExecutor()
    expect(() => connect(':memory:', { checkSameThread: true, executor })).toThrow(UsageError)
    expect(executor.submissions).toBe(0)
  })
})
