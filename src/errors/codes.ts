/**
 * Error Codes
 *
 * Central definition of every error code a call can terminate with, each
 * paired with a numeric status. Numeric values follow HTTP semantics for
 * familiarity; the gRPC adapter maps codes to gRPC status separately.
 *
 * Status Code Ranges:
 * - 400-499: Caller errors (bad input, cancelled, timed out)
 * - 500-599: Server errors (producer/session failure, unavailable)
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'INVALID_REQUEST') */
  code: string
  /** Numeric status code (e.g., 400) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Caller Errors
  // ─────────────────────────────────────────────────────────────

  /** Malformed or unacceptable input; never retried by the handler */
  INVALID_REQUEST: {
    code: 'INVALID_REQUEST',
    status: 400,
    message: 'Invalid request',
  },

  /** No handler registered for the method */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** Bounded operation exceeded its deadline */
  TIMEOUT: {
    code: 'TIMEOUT',
    status: 408,
    message: 'Deadline exceeded',
  },

  /**
   * Domain-level failure during unary processing
   *
   * The request was well-formed but could not be carried out
   * (e.g. a declined payment).
   */
  PROCESSING_FAILURE: {
    code: 'PROCESSING_FAILURE',
    status: 422,
    message: 'Processing failed',
  },

  /** Caller or server cancelled in-flight work */
  CANCELLED: {
    code: 'CANCELLED',
    status: 499, // nginx convention for client closed request
    message: 'Cancelled',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Server Errors
  // ─────────────────────────────────────────────────────────────

  /** Unexpected server error */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },

  /** Server-stream source failed mid-sequence */
  STREAM_PRODUCER_FAILURE: {
    code: 'STREAM_PRODUCER_FAILURE',
    status: 500,
    message: 'Stream producer failed',
  },

  /** A chat session's inbound or outbound path failed */
  SESSION_ERROR: {
    code: 'SESSION_ERROR',
    status: 500,
    message: 'Session error',
  },

  /** Server is shutting down or not accepting work */
  UNAVAILABLE: {
    code: 'UNAVAILABLE',
    status: 503,
    message: 'Service unavailable',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Whether a string is one of the known error codes
 */
export function isKnownCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get numeric status for a string code; unknown codes are server errors
 */
export function getStatusForCode(code: string): number {
  return isKnownCode(code) ? ErrorCodes[code].status : 500
}

/**
 * Check if a caller may retry a call that failed with this code
 *
 * Handlers themselves never retry; this only informs client policy.
 */
export function isRetryable(code: string): boolean {
  switch (code) {
    case 'TIMEOUT':
    case 'UNAVAILABLE':
      return true

    case 'INVALID_REQUEST':
    case 'NOT_FOUND':
    case 'PROCESSING_FAILURE':
    case 'CANCELLED':
    case 'STREAM_PRODUCER_FAILURE':
    case 'SESSION_ERROR':
    case 'INTERNAL_ERROR':
      return false

    default:
      return false
  }
}
