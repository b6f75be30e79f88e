/**
 * Logging Interceptor
 *
 * One structured line per handler invocation: method, request id, duration
 * (hrtime), outcome and error code. For stream calls the line marks the
 * moment the handler produced its stream; stream completion is logged by
 * the router's call tracker.
 */

import type { Interceptor, Envelope, Context } from '../types/index.js'
import { normalizeError } from '../errors/normalize.js'
import { createLogger, type Logger } from '../utils/logger.js'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

export interface LoggingOptions {
  /** pino logger to write to (defaults to the `calls` component logger) */
  logger?: Logger
  /** Level for successful calls */
  level?: LogLevel
  /** Log call metadata, with sensitive keys redacted */
  includeMetadata?: boolean
  /** Metadata keys to redact, case-insensitive */
  sensitiveHeaders?: string[]
  /** Glob patterns of methods that are not logged (`*` within a segment, `**` across) */
  excludeMethods?: string[]
}

export const DEFAULT_SENSITIVE_HEADERS = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-access-token',
  'x-refresh-token',
  'proxy-authorization',
]

/**
 * Redact sensitive values from metadata
 */
export function redactSensitiveHeaders(
  metadata: Readonly<Record<string, string>>,
  sensitiveHeaders: string[] = DEFAULT_SENSITIVE_HEADERS
): Record<string, string> {
  const sensitive = new Set(sensitiveHeaders.map((h) => h.toLowerCase()))
  const redacted: Record<string, string> = {}

  for (const [key, value] of Object.entries(metadata)) {
    redacted[key] = sensitive.has(key.toLowerCase()) ? '[REDACTED]' : value
  }
  return redacted
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*/g, '\u0000')
    .replace(/\*/g, '[^.]*')
    .replace(/\u0000/g, '.*')
  return new RegExp(`^${source}$`)
}

/**
 * Create a logging interceptor
 *
 * @example
 * ```typescript
 * router.use(createLoggingInterceptor({ excludeMethods: ['grpc.health.**'] }))
 * ```
 */
export function createLoggingInterceptor(options: LoggingOptions = {}): Interceptor {
  const {
    logger = createLogger('calls'),
    level = 'info',
    includeMetadata = false,
    sensitiveHeaders = DEFAULT_SENSITIVE_HEADERS,
    excludeMethods = [],
  } = options
  const excluded = excludeMethods.map(globToRegExp)

  return async (envelope: Envelope, ctx: Context, next: () => Promise<unknown>) => {
    if (excluded.some((re) => re.test(envelope.method))) {
      return next()
    }

    const start = process.hrtime.bigint()
    const unary = envelope.type === 'request'
    const entry = {
      requestId: ctx.requestId,
      method: envelope.method,
      kind: unary ? 'unary' : 'stream',
      ...(includeMetadata && { metadata: redactSensitiveHeaders(ctx.metadata, sensitiveHeaders) }),
    }
    const elapsed = (): number => Number(process.hrtime.bigint() - start) / 1_000_000

    try {
      const result = await next()
      logger[level]({ ...entry, durationMs: elapsed(), outcome: 'ok' }, 'call handled')
      return result
    } catch (err) {
      const { code, status } = normalizeError(err, unary ? 'PROCESSING_FAILURE' : 'INTERNAL_ERROR')
      const line = { ...entry, durationMs: elapsed(), outcome: 'error', code }
      if (status >= 500) {
        logger.error({ ...line, err }, 'call failed')
      } else {
        logger.warn(line, 'call failed')
      }
      throw err
    }
  }
}
