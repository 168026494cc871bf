import { existsSync, writeFileSync } from 'node:fs'
import type { Command } from 'commander'
import { DEFAULT_CONFIG } from '../../config/index.js'
import { output } from '../output.js'

/**
 * Register the `init` command on the Commander program.
 *
 * Generates a starter lite-relay.config.json with the default values.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a starter configuration file')
    .option('-o, --output <path>', 'output file path', 'lite-relay.config.json')
    .action((options: { output: string }) => {
      const configPath = options.output

      if (existsSync(configPath)) {
        output.warn(`Configuration file already exists: ${configPath}`)
        output.warn('Use a different path with --output or remove the existing file.')
        process.exit(1)
        return
      }

      writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n')
      output.info(`Configuration written to ${configPath}`)
      output.info('Run statements with: lite-relay exec <database> "<sql>" --config ' + configPath)
    })
}
