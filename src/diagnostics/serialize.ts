/**
 * Deterministic JSON rendering for diagnostic entries.
 *
 * Object keys are sorted, arrays keep their order. Values JSON has no form
 * for are rendered as strings: bigints by their digits, byte arrays as
 * `<N bytes>`, functions as `[function name]`.
 *
 * @param value - Any value, typically SQL text, parameters and outcomes
 * @returns A single-line JSON string
 */
export function serializeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null'
  }

  if (typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return JSON.stringify(value)
  }

  if (typeof value === 'bigint') {
    return JSON.stringify(value.toString())
  }

  if (typeof value === 'function') {
    return JSON.stringify(`[function ${value.name || 'anonymous'}]`)
  }

  if (value instanceof Uint8Array) {
    return JSON.stringify(`<${value.byteLength} bytes>`)
  }

  if (value instanceof Error) {
    return serializeValue({ name: value.name, message: value.message })
  }

  if (Array.isArray(value)) {
    const elements = value.map((el: unknown) => serializeValue(el))
    return '[' + elements.join(',') + ']'
  }

  if (typeof value === 'object') {
    const pairs = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => JSON.stringify(k) + ':' + serializeValue(v))
    return '{' + pairs.join(',') + '}'
  }

  return JSON.stringify(String(value))
}
