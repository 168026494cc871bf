import { Command } from 'commander'
import { registerDumpCommand } from './commands/dump.js'
import { registerExecCommand } from './commands/exec.js'
import { registerInitCommand } from './commands/init.js'
import { registerScriptCommand } from './commands/script.js'

/** Build the lite-relay command tree without parsing anything. */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('lite-relay')
    .description('Run SQLite statements through the lite-relay connection bridge')
    .version('0.1.0')

  registerInitCommand(program)
  registerExecCommand(program)
  registerScriptCommand(program)
  registerDumpCommand(program)

  return program
}
