export {
  ConnectSettingsSchema,
  DiagnosticLevelSchema,
  IsolationLevelSchema,
  RelayConfigSchema,
  type ConnectSettings,
  type RelayConfig,
} from './config.js'
