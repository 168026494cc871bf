import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { output } from '../output.js'
import { openConnection } from '../session.js'

/**
 * Register the `dump` command on the Commander program.
 *
 * Prints the database as SQL text, one statement per line.
 */
export function registerDumpCommand(program: Command): void {
  program
    .command('dump')
    .description('Print a database as SQL statements')
    .argument('<database>', 'database file path')
    .option('-c, --config <path>', 'configuration file path')
    .action(async (database: string, options: { config?: string }) => {
      try {
        const config = loadConfig(options.config)
        await openConnection(database, { ...config, connection: { ...config.connection, fileMustExist: true } }).use(
          async (conn) => {
            for (const line of await conn.iterdump()) {
              output.info(line)
            }
          },
        )
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
