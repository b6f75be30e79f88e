/**
 * Envelope Types
 *
 * The Envelope is the unit passed between the transport adapter and the
 * router. Every request, stream frame and error travels inside one.
 */

import type { Context } from './context.js'
import { getStatusForCode } from '../errors/codes.js'

/**
 * Envelope message types
 */
export type EnvelopeType =
  | 'request'       // Unary call (expects response)
  | 'response'      // Unary response
  | 'stream:start'  // Stream initiation
  | 'stream:data'   // Stream data frame
  | 'stream:end'    // Clean stream termination
  | 'stream:error'  // Terminal stream error
  | 'error'         // Unary or routing error

/**
 * Base Envelope structure
 */
export interface Envelope<T = unknown> {
  /** Message ID */
  id: string

  /** Fully-qualified method name */
  method: string

  /** Message type */
  type: EnvelopeType

  /** Payload data */
  payload: T

  /** Protocol metadata */
  metadata: Record<string, string>

  /** Call context */
  context: Context
}

/**
 * Error payload structure
 */
export interface ErrorPayload {
  /** String error code (e.g. 'INVALID_REQUEST', 'TIMEOUT') */
  code: string

  /** Numeric status code (HTTP-compatible) */
  status: number

  /** Human-readable message */
  message: string

  /** Additional details */
  details?: unknown
}

/**
 * Error envelope
 */
export interface ErrorEnvelope extends Envelope<ErrorPayload> {
  type: 'error' | 'stream:error'
}

/**
 * Narrow an envelope to an error envelope
 */
export function isErrorEnvelope(envelope: Envelope): envelope is ErrorEnvelope {
  return envelope.type === 'error' || envelope.type === 'stream:error'
}

/**
 * Create a response envelope from a request
 */
export function createResponseEnvelope<T>(
  request: Envelope,
  payload: T
): Envelope<T> {
  return {
    id: `${request.id}:response`,
    method: request.method,
    type: 'response',
    payload,
    metadata: {},
    context: request.context,
  }
}

/**
 * Create an error envelope from a request
 */
export function createErrorEnvelope(
  request: Envelope,
  code: string,
  message: string,
  details?: unknown,
  status?: number,
  type: ErrorEnvelope['type'] = 'error'
): ErrorEnvelope {
  return {
    id: `${request.id}:${type}`,
    method: request.method,
    type,
    payload: {
      code,
      status: status ?? getStatusForCode(code),
      message,
      details,
    },
    metadata: {},
    context: request.context,
  }
}
