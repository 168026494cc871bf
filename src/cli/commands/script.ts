import { readFileSync } from 'node:fs'
import type { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { output } from '../output.js'
import { openConnection } from '../session.js'

/**
 * Register the `script` command on the Commander program.
 *
 * Runs a file of SQL statements through executescript.
 */
export function registerScriptCommand(program: Command): void {
  program
    .command('script')
    .description('Run a SQL script file against a database')
    .argument('<database>', 'database file path')
    .argument('<file>', 'SQL script to run')
    .option('-c, --config <path>', 'configuration file path')
    .option('--echo', 'trace dispatched calls to the diagnostics sink')
    .action(async (database: string, file: string, options: { config?: string; echo?: boolean }) => {
      try {
        const config = loadConfig(options.config)
        const script = readFileSync(file, 'utf-8')
        await openConnection(database, config, options.echo).use(async (conn) => {
          await conn.executescript(script).use(() => undefined)
        })
        output.success(`Script ${file} executed`)
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
