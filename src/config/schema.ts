/**
 * Configuration Schema
 */

import { z } from 'zod'

const booleanFlag = z
  .string()
  .toLowerCase()
  .pipe(
    z.enum(['true', 'false', '1', '0', 'yes', 'no'], {
      errorMap: () => ({ message: 'must be true or false' }),
    })
  )
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const integer = (min: number, max: number) => z.coerce.number().int().min(min).max(max)

/**
 * Environment variables, as read from `process.env`
 */
export const envSchema = z
  .object({
    TANDEM_HOST: z.string().min(1).default('0.0.0.0'),
    TANDEM_PORT: integer(0, 65535).default(50051),
    TANDEM_CHAT_QUEUE_DEPTH: integer(1, 65536).default(32),
    TANDEM_PAYMENT_TIMEOUT_MS: integer(1, 600_000).default(5000),
    TANDEM_IDEMPOTENCY_TTL_MS: integer(1, 7 * 24 * 60 * 60 * 1000).default(24 * 60 * 60 * 1000),
    TANDEM_SHUTDOWN_GRACE_MS: integer(0, 600_000).default(5000),
    TANDEM_MAX_MESSAGE_BYTES: integer(1024, 1024 * 1024 * 1024).default(4 * 1024 * 1024),
    TANDEM_TLS_KEY_PATH: z.string().min(1).optional(),
    TANDEM_TLS_CERT_PATH: z.string().min(1).optional(),
    TANDEM_TLS_CA_PATH: z.string().min(1).optional(),
    TANDEM_TLS_REQUIRE_CLIENT_CERT: booleanFlag.default('false'),
  })
  .refine((env) => (env.TANDEM_TLS_KEY_PATH === undefined) === (env.TANDEM_TLS_CERT_PATH === undefined), {
    message: 'TANDEM_TLS_KEY_PATH and TANDEM_TLS_CERT_PATH must be set together',
    path: ['TANDEM_TLS_KEY_PATH'],
  })

export interface TlsConfig {
  keyPath: string
  certPath: string
  caPath?: string
  requireClientCert: boolean
}

/**
 * Resolved server configuration
 */
export interface ServerConfig {
  host: string
  port: number
  chat: {
    /** Per-session outbound queue capacity */
    queueDepth: number
  }
  payments: {
    /** Unary processing deadline (ms) */
    timeoutMs: number
    /** How long an approved answer is replayed for its idempotency key (ms) */
    idempotencyTtlMs: number
  }
  /** Drain window before remaining sessions are force-closed (ms) */
  shutdownGraceMs: number
  /** gRPC send/receive message size limit (bytes) */
  maxMessageBytes: number
  tls?: TlsConfig
}
