export { loadConfig, ConfigError } from './loader.js'
export { envSchema, type ServerConfig, type TlsConfig } from './schema.js'
