import type { PendingResult } from '../bridge/index.js'
import { connect, type Connection } from '../connection/index.js'
import { createFileSink, createStreamSink } from '../diagnostics/index.js'
import { WorkerPool } from '../executor/index.js'
import type { RelayConfig } from '../types/config.js'

/**
 * Open a connection configured from a loaded RelayConfig. `--echo` turns
 * tracing on regardless of the file.
 */
export function openConnection(
  database: string,
  config: RelayConfig,
  echo = false,
): PendingResult<Connection> {
  const { level, path } = config.diagnostics
  return connect(database, {
    ...config.connection,
    echo: echo || config.connection.echo,
    executor: new WorkerPool({ maxWorkers: config.pool.maxWorkers }),
    sink: path === undefined ? createStreamSink(process.stderr, level) : createFileSink(path, level),
  })
}
