#!/usr/bin/env node
import { createProgram } from './program.js'
import { output } from './output.js'

const program = createProgram()

program.parseAsync().catch((err: unknown) => {
  output.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
