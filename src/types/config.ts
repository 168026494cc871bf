import { Type, type Static } from '@sinclair/typebox'

/** Implicit-transaction mode; null selects autocommit. */
export const IsolationLevelSchema = Type.Union([
  Type.Literal(''),
  Type.Literal('DEFERRED'),
  Type.Literal('IMMEDIATE'),
  Type.Literal('EXCLUSIVE'),
  Type.Null(),
])

export const DiagnosticLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
])

/** Scalar connection settings accepted by `connect()` and `new Connection()`. */
export const ConnectSettingsSchema = Type.Object({
  timeout: Type.Number({ minimum: 0, default: 5 }),
  echo: Type.Boolean({ default: false }),
  isolationLevel: IsolationLevelSchema,
  checkSameThread: Type.Literal(false),
  readonly: Type.Boolean({ default: false }),
  fileMustExist: Type.Boolean({ default: false }),
  safeIntegers: Type.Boolean({ default: false }),
})

export type ConnectSettings = Static<typeof ConnectSettingsSchema>

/** Schema for lite-relay.config.json, used by the CLI. */
export const RelayConfigSchema = Type.Object({
  connection: ConnectSettingsSchema,
  pool: Type.Object({
    maxWorkers: Type.Optional(Type.Integer({ minimum: 1 })),
  }),
  diagnostics: Type.Object({
    level: DiagnosticLevelSchema,
    path: Type.Optional(Type.String({ minLength: 1 })),
  }),
})

export type RelayConfig = Static<typeof RelayConfigSchema>
