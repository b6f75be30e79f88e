/**
 * Error Factories
 *
 * Pre-built helpers for the call error taxonomy. Each factory creates a
 * CallError with both string code and numeric status.
 */

import { CallError } from './call-error.js'

/**
 * Field-level validation issue
 */
export interface FieldIssue {
  field: string
  message: string
  code?: string
}

/**
 * @example
 * ```typescript
 * throw Errors.validation([{ field: 'amount', message: 'must be positive' }])
 * // { code: 'INVALID_REQUEST', status: 400, message: 'amount: must be positive' }
 *
 * throw Errors.timeout('processPayment', 5000)
 * // { code: 'TIMEOUT', status: 408, message: "Operation 'processPayment' timed out after 5000ms" }
 * ```
 */
export const Errors = {
  /**
   * Malformed or unacceptable input
   */
  invalidRequest(message: string, details?: unknown): CallError {
    return new CallError('INVALID_REQUEST', message, details)
  },

  /**
   * Schema validation failed for one or more fields
   */
  validation(issues: FieldIssue[]): CallError {
    const message = issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')
    return new CallError('INVALID_REQUEST', message || 'Validation failed', { issues })
  },

  /**
   * Domain failure while processing a unary call
   * @param reason - Why processing failed (e.g. 'card declined')
   */
  processingFailure(reason: string, details?: unknown): CallError {
    return new CallError('PROCESSING_FAILURE', reason, details)
  },

  /**
   * Server-stream source failed mid-sequence
   * @param cause - Underlying producer error
   * @param emitted - Number of frames already sent
   */
  streamProducerFailure(cause: unknown, emitted?: number): CallError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new CallError('STREAM_PRODUCER_FAILURE', `Stream producer failed: ${reason}`, {
      ...(emitted !== undefined && { emitted }),
    })
  },

  /**
   * Bidirectional session path failed
   */
  sessionError(sessionId: string, direction: 'inbound' | 'outbound', cause: unknown): CallError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new CallError('SESSION_ERROR', `Session ${direction} path failed: ${reason}`, {
      sessionId,
      direction,
    })
  },

  /**
   * Bounded operation exceeded its deadline
   * @param operation - What operation timed out
   * @param timeoutMs - The deadline that was exceeded
   */
  timeout(operation?: string, timeoutMs?: number): CallError {
    const base = operation ? `Operation '${operation}' timed out` : 'Request timed out'
    const message = timeoutMs !== undefined ? `${base} after ${timeoutMs}ms` : base
    return new CallError('TIMEOUT', message, timeoutMs !== undefined ? { timeoutMs } : undefined)
  },

  /**
   * Caller or server cancelled in-flight work
   */
  cancelled(reason?: string): CallError {
    return new CallError('CANCELLED', reason || 'Call was cancelled')
  },

  /**
   * No handler for the method
   */
  notFound(method: string): CallError {
    return new CallError('NOT_FOUND', `Method '${method}' not found`, { method })
  },

  /**
   * Server not accepting work
   */
  unavailable(reason?: string): CallError {
    return new CallError('UNAVAILABLE', reason || 'Service unavailable')
  },

  /**
   * Unexpected server error
   */
  internal(message?: string, details?: unknown): CallError {
    return new CallError('INTERNAL_ERROR', message || 'An internal error occurred', details)
  },
} as const
