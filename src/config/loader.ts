/**
 * Configuration Loader
 *
 * Reads TANDEM_* environment variables into a typed ServerConfig.
 */

import { envSchema, type ServerConfig } from './schema.js'

/**
 * Thrown when one or more settings are invalid
 */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`)
    this.name = 'ConfigError'
  }
}

type Env = Record<string, string | undefined>

/**
 * Drop empty values so they fall back to defaults
 */
function present(env: Env): Env {
  const out: Env = {}
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('TANDEM_') && value !== undefined && value.trim() !== '') {
      out[key] = value.trim()
    }
  }
  return out
}

/**
 * Load configuration from the environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const result = envSchema.safeParse(present(env))
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    )
  }

  const vars = result.data
  const config: ServerConfig = {
    host: vars.TANDEM_HOST,
    port: vars.TANDEM_PORT,
    chat: { queueDepth: vars.TANDEM_CHAT_QUEUE_DEPTH },
    payments: {
      timeoutMs: vars.TANDEM_PAYMENT_TIMEOUT_MS,
      idempotencyTtlMs: vars.TANDEM_IDEMPOTENCY_TTL_MS,
    },
    shutdownGraceMs: vars.TANDEM_SHUTDOWN_GRACE_MS,
    maxMessageBytes: vars.TANDEM_MAX_MESSAGE_BYTES,
  }

  if (vars.TANDEM_TLS_KEY_PATH !== undefined && vars.TANDEM_TLS_CERT_PATH !== undefined) {
    config.tls = {
      keyPath: vars.TANDEM_TLS_KEY_PATH,
      certPath: vars.TANDEM_TLS_CERT_PATH,
      caPath: vars.TANDEM_TLS_CA_PATH,
      requireClientCert: vars.TANDEM_TLS_REQUIRE_CLIENT_CERT,
    }
  }

  return config
}
