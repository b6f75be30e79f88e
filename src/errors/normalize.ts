/**
 * Error normalization
 *
 * Turns any thrown value into an ErrorPayload so every failure path can
 * produce an observable terminal signal.
 */

import type { ErrorPayload } from '../types/envelope.js'
import { isCallError } from './call-error.js'
import { getStatusForCode } from './codes.js'

/**
 * Normalize any error to a consistent payload
 *
 * @param fallbackCode - Code used for errors that are not CallErrors
 *
 * @example
 * try {
 *   await handler()
 * } catch (error) {
 *   const payload = normalizeError(error, 'PROCESSING_FAILURE')
 * }
 */
export function normalizeError(error: unknown, fallbackCode = 'INTERNAL_ERROR'): ErrorPayload {
  if (isCallError(error)) {
    return error.toJSON()
  }

  if (error instanceof Error) {
    return {
      code: fallbackCode,
      status: getStatusForCode(fallbackCode),
      message: error.message || 'An unexpected error occurred',
    }
  }

  return {
    code: fallbackCode,
    status: getStatusForCode(fallbackCode),
    message: typeof error === 'string' ? error : 'An unexpected error occurred',
  }
}

/**
 * Read the reason an AbortSignal was aborted with, as an Error
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  if (reason instanceof Error) return reason
  return new Error(typeof reason === 'string' ? reason : 'Aborted')
}
