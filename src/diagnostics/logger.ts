export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error'

export const LEVEL_ORDER: Readonly<Record<DiagnosticLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/** One structured diagnostic record. */
export interface DiagnosticEntry {
  sequence: number
  timestamp: string
  level: DiagnosticLevel
  event: string
  fields?: Record<string, unknown>
}

/** Destination for diagnostic entries. */
export interface DiagnosticsSink {
  write(entry: DiagnosticEntry): void
}

/**
 * Leveled front end over a sink.
 *
 * Entries are numbered per instance. A sink that throws is ignored: logging
 * never changes the outcome or ordering of the operation being logged.
 */
export class Diagnostics {
  private sequence = 0
  private readonly sink: DiagnosticsSink

  constructor(sink: DiagnosticsSink) {
    this.sink = sink
  }

  debug(event: string, fields?: Record<string, unknown>): void {
    this.emit('debug', event, fields)
  }

  info(event: string, fields?: Record<string, unknown>): void {
    this.emit('info', event, fields)
  }

  warn(event: string, fields?: Record<string, unknown>): void {
    this.emit('warn', event, fields)
  }

  error(event: string, fields?: Record<string, unknown>): void {
    this.emit('error', event, fields)
  }

  private emit(level: DiagnosticLevel, event: string, fields?: Record<string, unknown>): void {
    this.sequence++
    const entry: DiagnosticEntry = {
      sequence: this.sequence,
      timestamp: new Date().toISOString(),
      level,
      event,
    }
    if (fields !== undefined) {
      entry.fields = fields
    }

    try {
      this.sink.write(entry)
    } catch {
      // Sink failures stay inside the sink
    }
  }
}
