import type { SqlParameters } from '../driver/index.js'

/**
 * Parameter sets as they appear in echo entries. Arrays are logged as given;
 * other iterables are not drained, since the driver consumes them.
 */
export function describeBatch(seqOfParameters: Iterable<SqlParameters>): unknown {
  return Array.isArray(seqOfParameters) ? seqOfParameters : '<iterable>'
}
