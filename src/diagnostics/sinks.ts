import { appendFileSync } from 'node:fs'
import { serializeValue } from './serialize.js'
import { LEVEL_ORDER, type DiagnosticEntry, type DiagnosticLevel, type DiagnosticsSink } from './logger.js'

/** Render an entry as one JSONL line, newline included. */
export function formatEntry(entry: DiagnosticEntry): string {
  return serializeValue(entry) + '\n'
}

/**
 * Write entries at or above `minLevel` as JSON lines to a stream.
 * Defaults to stderr so diagnostics never mix with command output.
 */
export function createStreamSink(
  stream: NodeJS.WritableStream = process.stderr,
  minLevel: DiagnosticLevel = 'debug',
): DiagnosticsSink {
  return {
    write(entry: DiagnosticEntry): void {
      if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return
      stream.write(formatEntry(entry))
    },
  }
}

/** Append entries at or above `minLevel` to a JSONL file. */
export function createFileSink(path: string, minLevel: DiagnosticLevel = 'debug'): DiagnosticsSink {
  return {
    write(entry: DiagnosticEntry): void {
      if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return
      appendFileSync(path, formatEntry(entry))
    },
  }
}
