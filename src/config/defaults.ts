import type { ConnectSettings, RelayConfig } from '../types/config.js'

/** Connection defaults: 5 second lock timeout, deferred implicit transactions, no echo */
export const DEFAULT_CONNECT_SETTINGS: ConnectSettings = {
  timeout: 5,
  echo: false,
  isolationLevel: '',
  checkSameThread: false,
  readonly: false,
  fileMustExist: false,
  safeIntegers: false,
}

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: RelayConfig = {
  connection: DEFAULT_CONNECT_SETTINGS,
  pool: {},
  diagnostics: {
    level: 'info',
  },
}
