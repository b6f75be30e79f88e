import { getStatusForCode } from './codes.js'
import type { ErrorPayload } from '../types/envelope.js'

/**
 * Call error - thrown by handlers and services to signal known failures
 *
 * Carries a string code (e.g. 'INVALID_REQUEST') and a numeric status so
 * the same error can be rendered by any transport.
 */
export class CallError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Caller errors
   * - 500-599: Server errors
   */
  public readonly status: number

  constructor(
    /** String error code (e.g. 'TIMEOUT', 'SESSION_ERROR') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number
  ) {
    super(message)
    this.name = 'CallError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Rebuild an error from a wire payload
   */
  static fromPayload(payload: ErrorPayload): CallError {
    return new CallError(payload.code, payload.message, payload.details, payload.status)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): ErrorPayload {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Check if a value is a CallError
 */
export function isCallError(error: unknown): error is CallError {
  return error instanceof CallError
}
