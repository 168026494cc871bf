export { loadConfig, resolveConnectSettings, ConfigError } from './loader.js'
export { DEFAULT_CONFIG, DEFAULT_CONNECT_SETTINGS } from './defaults.js'
