import { PendingResult } from '../bridge/index.js'
import { Connection, type ConnectionOptions } from './connection.js'

/**
 * Create a connection and open it on its executor.
 *
 *     const conn = await connect('app.db')
 *
 *     await connect('app.db').use(async (conn) => { ... })  // closed on exit
 *
 * Invalid options throw here, before anything is opened. A close failure
 * after a failed scope body is logged as `connection.release_failed`.
 */
export function connect(database: string, options: ConnectionOptions = {}): PendingResult<Connection> {
  const connection = new Connection(database, options)
  return new PendingResult(connection.connect(), {
    transform: (conn: Connection) => conn,
    release: (conn: Connection) => conn.close(),
    onReleaseError: (error: unknown) => connection.diagnostics.warn('connection.release_failed', { error }),
  })
}
