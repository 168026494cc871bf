import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import type { SqlParameters } from '../../driver/index.js'
import type { RelayConfig } from '../../types/config.js'
import { output } from '../output.js'
import { formatCell, parseParams } from '../params.js'
import { openConnection } from '../session.js'

interface ExecOptions {
  params?: string
  config?: string
  echo?: boolean
}

function toCells(row: unknown): string[] {
  return Array.isArray(row) ? row.map((value: unknown) => formatCell(value)) : [formatCell(row)]
}

/**
 * Register the `exec` command on the Commander program.
 *
 * Runs one statement, prints its rows (or the change count), commits and
 * closes the connection.
 */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Run one SQL statement against a database')
    .argument('<database>', 'database file path')
    .argument('<sql>', 'SQL statement to run')
    .option('-p, --params <json>', 'statement parameters as a JSON array or object')
    .option('-c, --config <path>', 'configuration file path')
    .option('--echo', 'trace dispatched calls to the diagnostics sink')
    .action(async (database: string, sql: string, options: ExecOptions) => {
      let config: RelayConfig
      let parameters: SqlParameters
      try {
        config = loadConfig(options.config)
        parameters = parseParams(options.params)
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
        return
      }

      try {
        await openConnection(database, config, options.echo).use(async (conn) => {
          await conn.execute(sql, parameters).use(async (cursor) => {
            const rows = await cursor.fetchall()
            const description = cursor.description
            if (description) {
              output.table(
                description.map((column) => column.name),
                rows.map(toCells),
              )
              output.info(`(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})`)
            } else {
              output.info(`${cursor.rowcount} ${cursor.rowcount === 1 ? 'row' : 'rows'} affected`)
            }
          })
          await conn.commit()
        })
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
