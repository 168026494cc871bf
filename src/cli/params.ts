import { Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type { SqlParameters } from '../driver/index.js'

const JsonSqlValue = Type.Union([Type.Null(), Type.Number(), Type.String()])

/** `--params` accepts a JSON array (positional) or object (named). */
export const ParamsSchema = Type.Union([
  Type.Array(JsonSqlValue),
  Type.Record(Type.String(), JsonSqlValue),
])

/**
 * Parse the `--params` option.
 *
 * @throws Error naming the problem when the text is not JSON or holds
 *         values SQLite cannot bind from JSON (booleans, nested values)
 */
export function parseParams(text: string | undefined): SqlParameters {
  if (text === undefined) return []

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new Error(`--params is not valid JSON: ${text}`)
  }

  if (!Value.Check(ParamsSchema, parsed)) {
    throw new Error('--params must be a JSON array or object of numbers, strings and nulls')
  }
  return parsed
}

/** Render one result value as a table cell. */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL'
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
  return String(value)
}
