import { readFileSync } from 'node:fs'
import { KindGuard, type TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import {
  ConnectSettingsSchema,
  RelayConfigSchema,
  type ConnectSettings,
  type RelayConfig,
} from '../types/config.js'
import { DEFAULT_CONFIG, DEFAULT_CONNECT_SETTINGS } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings; this converts numeric, boolean
 * and null strings to their proper types.
 */
function coerceValue(value: string): string | number | boolean | null {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (value.toLowerCase() === 'null') return null

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the key among `keys` that matches the given key case-insensitively.
 * Returns the original-cased key if found, or the input key if no match exists.
 */
function findCaseInsensitiveKey(keys: string[], key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of keys) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

function propertiesOf(schema: TSchema | undefined): Record<string, TSchema> {
  return schema !== undefined && KindGuard.IsObject(schema) ? schema.properties : {}
}

/**
 * Set a nested value in an object using a path array.
 * Resolves each path segment case-insensitively against existing keys and
 * the keys the schema declares, so optional fields absent from the defaults
 * keep their casing.
 */
function setNestedValue(
  obj: Record<string, unknown>,
  schema: TSchema | undefined,
  path: string[],
  value: unknown,
): void {
  let current = obj
  let currentSchema = schema
  for (const segment of path.slice(0, -1)) {
    const properties = propertiesOf(currentSchema)
    const resolvedKey = findCaseInsensitiveKey([...Object.keys(current), ...Object.keys(properties)], segment)
    currentSchema = properties[resolvedKey]
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const finalKeys = [...Object.keys(current), ...Object.keys(propertiesOf(currentSchema))]
  const finalKey = findCaseInsensitiveKey(finalKeys, path[path.length - 1])
  current[finalKey] = value
}

/**
 * Apply LITE_RELAY_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   LITE_RELAY_CONNECTION__TIMEOUT=10 -> config.connection.timeout = 10
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const prefix = 'LITE_RELAY_'
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(prefix) || value === undefined) continue
    const path = key.slice(prefix.length).toLowerCase().split('__')
    setNestedValue(config, RelayConfigSchema, path, coerceValue(value))
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

function invalid(schema: TSchema, value: unknown, heading: string): ConfigError {
  const fields = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path,
    message: e.message,
  }))
  const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
  return new ConfigError(`${heading}:\n${fieldMessages}`, fields)
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen RelayConfig.
 *
 * Pipeline: read file (when given) -> parse JSON -> merge defaults
 *           -> apply env overrides -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to lite-relay.config.json; omit to use defaults and env only
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string): RelayConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // Deep clone so defaults are never shared with the returned object
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge(DEFAULT_CONFIG, userConfig)))
  if (!isPlainObject(merged)) {
    throw new ConfigError('Configuration must be an object')
  }

  const config = applyEnvOverrides(merged)
  normalizeIsolationLevel(config.connection)

  if (!Value.Check(RelayConfigSchema, config)) {
    throw invalid(RelayConfigSchema, config, 'Configuration invalid')
  }

  return deepFreeze(config)
}

function normalizeIsolationLevel(settings: unknown): void {
  if (!isPlainObject(settings)) return
  const level = settings.isolationLevel
  if (typeof level === 'string') {
    settings.isolationLevel = level.toUpperCase()
  }
}

/**
 * Fill in connection defaults and validate the result.
 *
 * Only the keys of the settings schema are read, so a full options object
 * (executor, scheduler, sink, ...) can be passed as is.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConnectSettings(options: Partial<Record<keyof ConnectSettings, unknown>> = {}): ConnectSettings {
  const candidate: Record<string, unknown> = { ...DEFAULT_CONNECT_SETTINGS }
  for (const key of Object.keys(ConnectSettingsSchema.properties)) {
    const value: unknown = Reflect.get(options, key)
    if (value !== undefined) candidate[key] = value
  }
  normalizeIsolationLevel(candidate)

  if (!Value.Check(ConnectSettingsSchema, candidate)) {
    throw invalid(ConnectSettingsSchema, candidate, 'Connection options invalid')
  }
  return candidate
}
