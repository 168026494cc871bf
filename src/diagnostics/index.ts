export {
  Diagnostics,
  LEVEL_ORDER,
  type DiagnosticEntry,
  type DiagnosticLevel,
  type DiagnosticsSink,
} from './logger.js'
export { createFileSink, createStreamSink, formatEntry } from './sinks.js'
export { serializeValue } from './serialize.js'
