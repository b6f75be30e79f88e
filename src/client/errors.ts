/**
 * gRPC status → CallError
 */

import * as grpc from '@grpc/grpc-js'
import { ERROR_CODE_METADATA_KEY } from '../adapters/grpc.js'
import { CallError } from '../errors/call-error.js'
import { isKnownCode } from '../errors/codes.js'

const STATUS_TO_CODE: Partial<Record<grpc.status, string>> = {
  [grpc.status.INVALID_ARGUMENT]: 'INVALID_REQUEST',
  [grpc.status.FAILED_PRECONDITION]: 'PROCESSING_FAILURE',
  [grpc.status.ABORTED]: 'SESSION_ERROR',
  [grpc.status.DEADLINE_EXCEEDED]: 'TIMEOUT',
  [grpc.status.CANCELLED]: 'CANCELLED',
  [grpc.status.NOT_FOUND]: 'NOT_FOUND',
  [grpc.status.UNAVAILABLE]: 'UNAVAILABLE',
  [grpc.status.INTERNAL]: 'INTERNAL_ERROR',
}

export function isServiceError(error: unknown): error is grpc.ServiceError {
  return error instanceof Error && 'code' in error && typeof error.code === 'number' && 'details' in error
}

/**
 * Convert a gRPC failure into a CallError
 *
 * The server sends its exact code in trailing metadata; without it the
 * status is mapped back as closely as it allows.
 */
export function fromServiceError(error: unknown): CallError {
  if (error instanceof CallError) return error
  if (!isServiceError(error)) {
    return new CallError('INTERNAL_ERROR', error instanceof Error ? error.message : String(error))
  }

  const [sent] = error.metadata?.get(ERROR_CODE_METADATA_KEY) ?? []
  const code =
    typeof sent === 'string' && isKnownCode(sent)
      ? sent
      : STATUS_TO_CODE[error.code] ?? 'INTERNAL_ERROR'

  return new CallError(code, error.details || error.message, { grpcStatus: error.code })
}
