/**
 * Error Tests
 */

import { describe, it, expect } from 'vitest'
import { CallError, isCallError } from './call-error.js'
import { Errors } from './factories.js'
import { normalizeError, abortReason } from './normalize.js'
import { getStatusForCode, isRetryable } from './codes.js'

describe('CallError', () => {
  it('should take its status from the code table', () => {
    const error = new CallError('INVALID_REQUEST', 'bad')
    expect(error.status).toBe(400)
    expect(error.name).toBe('CallError')
    expect(isCallError(error)).toBe(true)
    expect(isCallError(new Error('plain'))).toBe(false)
  })

  it('should serialize without undefined details', () => {
    expect(new CallError('TIMEOUT', 'slow').toJSON()).toEqual({ code: 'TIMEOUT', status: 408, message: 'slow' })
    expect(new CallError('NOT_FOUND', 'gone', { method: 'x' }).toJSON()).toEqual({
      code: 'NOT_FOUND',
      status: 404,
      message: 'gone',
      details: { method: 'x' },
    })
  })

  it('should rebuild from a payload', () => {
    const error = CallError.fromPayload({ code: 'SESSION_ERROR', status: 500, message: 'lost' })
    expect(error.code).toBe('SESSION_ERROR')
    expect(error.message).toBe('lost')
  })

  it('should map unknown codes to 500', () => {
    expect(getStatusForCode('SOMETHING_ELSE')).toBe(500)
    expect(getStatusForCode('PROCESSING_FAILURE')).toBe(422)
    expect(getStatusForCode('CANCELLED')).toBe(499)
  })
})

describe('Errors', () => {
  it('should join validation issues into one message', () => {
    const error = Errors.validation([
      { field: 'amount', message: 'must be positive' },
      { field: 'currency', message: 'must be a 3-letter currency code' },
    ])
    expect(error.code).toBe('INVALID_REQUEST')
    expect(error.message).toBe('amount: must be positive; currency: must be a 3-letter currency code')
  })

  it('should describe stream producer failures', () => {
    const error = Errors.streamProducerFailure(new Error('disk gone'), 3)
    expect(error.code).toBe('STREAM_PRODUCER_FAILURE')
    expect(error.message).toBe('Stream producer failed: disk gone')
    expect(error.details).toEqual({ emitted: 3 })
  })

  it('should describe session errors', () => {
    const error = Errors.sessionError('sess_1', 'outbound', 'reset')
    expect(error.message).toBe('Session outbound path failed: reset')
    expect(error.details).toEqual({ sessionId: 'sess_1', direction: 'outbound' })
  })

  it('should describe timeouts', () => {
    expect(Errors.timeout('processPayment', 5000).message).toBe("Operation 'processPayment' timed out after 5000ms")
    expect(Errors.timeout().message).toBe('Request timed out')
  })

  it('should default the cancel reason', () => {
    expect(Errors.cancelled().message).toBe('Call was cancelled')
    expect(Errors.cancelled().status).toBe(499)
  })
})

describe('normalizeError', () => {
  it('should keep CallError payloads', () => {
    expect(normalizeError(Errors.notFound('a.b'))).toEqual({
      code: 'NOT_FOUND',
      status: 404,
      message: "Method 'a.b' not found",
      details: { method: 'a.b' },
    })
  })

  it('should apply the fallback code to plain errors', () => {
    expect(normalizeError(new Error('oops'), 'PROCESSING_FAILURE')).toEqual({
      code: 'PROCESSING_FAILURE',
      status: 422,
      message: 'oops',
    })
    expect(normalizeError('text')).toEqual({ code: 'INTERNAL_ERROR', status: 500, message: 'text' })
    expect(normalizeError(42).message).toBe('An unexpected error occurred')
  })

  it('should read abort reasons as errors', () => {
    const controller = new AbortController()
    controller.abort(Errors.cancelled('gone'))
    expect(abortReason(controller.signal)).toMatchObject({ code: 'CANCELLED', message: 'gone' })

    const other = new AbortController()
    other.abort('plain reason')
    expect(abortReason(other.signal).message).toBe('plain reason')
  })
})

describe('status helpers', () => {
  it('should mark timeouts and unavailability as retryable', () => {
    expect(isRetryable('TIMEOUT')).toBe(true)
    expect(isRetryable('UNAVAILABLE')).toBe(true)
    expect(isRetryable('PROCESSING_FAILURE')).toBe(false)
  })
})
