/**
 * Payment Service
 *
 * Unary domain: validate, charge once, answer. A repeated idempotency key
 * for the same account and the same payment returns the first answer
 * without charging again; concurrent duplicates share the in-flight charge.
 *
 * A shared charge runs under a signal the service owns. Each caller waits
 * on it with its own signal, and the charge is only abandoned once every
 * caller has left.
 */

import { raceAbort } from '../core/abort.js'
import { Errors } from '../errors/factories.js'
import type { Context } from '../types/context.js'
import { validate } from '../validation/parse.js'
import { createLogger } from '../utils/logger.js'
import {
  paymentRequestSchema,
  type PaymentGateway,
  type PaymentRequest,
  type PaymentResponse,
} from './types.js'

const logger = createLogger('payments')

export const DEFAULT_IDEMPOTENCY_TTL_MS = 24 * 60 * 60 * 1000
export const DEFAULT_MAX_IDEMPOTENCY_KEYS = 10_000

export interface PaymentServiceOptions {
  /** How long an approved answer is replayed for its key (ms) */
  idempotencyTtlMs?: number
  /** Remembered keys; the oldest approved answers are evicted beyond this */
  maxIdempotencyKeys?: number
}

export interface PaymentService {
  /**
   * Process one payment attempt
   *
   * @throws CallError INVALID_REQUEST or PROCESSING_FAILURE
   */
  processPayment(input: unknown, ctx: Context): Promise<PaymentResponse>
}

interface Outcome {
  fingerprint: string
  promise: Promise<PaymentResponse>
  controller: AbortController
  /** Callers currently waiting on the charge */
  waiters: number
  settled: boolean
  /** Set once the charge was approved */
  settledAt?: number
}

function idempotencyScope(request: PaymentRequest): string | undefined {
  return request.idempotencyKey === undefined
    ? undefined
    : `${request.accountId}\u0000${request.idempotencyKey}`
}

function fingerprint(request: PaymentRequest): string {
  return JSON.stringify([request.amount, request.currency, request.description ?? null])
}

export function createPaymentService(
  gateway: PaymentGateway,
  options: PaymentServiceOptions = {}
): PaymentService {
  const ttlMs = options.idempotencyTtlMs ?? DEFAULT_IDEMPOTENCY_TTL_MS
  const maxKeys = options.maxIdempotencyKeys ?? DEFAULT_MAX_IDEMPOTENCY_KEYS
  const outcomes = new Map<string, Outcome>()

  async function charge(request: PaymentRequest, signal: AbortSignal, requestId: string): Promise<PaymentResponse> {
    const receipt = await gateway.charge(request, signal)
    const response: PaymentResponse = {
      id: receipt.paymentId,
      status: 'approved',
      accountId: request.accountId,
      amount: request.amount,
      currency: request.currency,
      processedAt: receipt.processedAt,
    }
    logger.info({ requestId, paymentId: response.id, accountId: request.accountId }, 'payment approved')
    return response
  }

  /**
   * Drop approved answers beyond the key limit, oldest first
   */
  function evict(): void {
    for (const [scope, outcome] of outcomes) {
      if (outcomes.size <= maxKeys) return
      if (outcome.settledAt !== undefined) outcomes.delete(scope)
    }
  }

  function lookup(scope: string): Outcome | undefined {
    const outcome = outcomes.get(scope)
    if (outcome?.settledAt !== undefined && Date.now() - outcome.settledAt >= ttlMs) {
      outcomes.delete(scope)
      return undefined
    }
    return outcome
  }

  function begin(scope: string, request: PaymentRequest, requestId: string): Outcome {
    const controller = new AbortController()
    const outcome: Outcome = {
      fingerprint: fingerprint(request),
      controller,
      waiters: 0,
      settled: false,
      promise: charge(request, controller.signal, requestId),
    }
    void outcome.promise.then(
      () => {
        outcome.settled = true
        outcome.settledAt = Date.now()
      },
      () => {
        outcome.settled = true
        // Only approved charges are remembered; a failed attempt may be retried
        if (outcomes.get(scope) === outcome) outcomes.delete(scope)
      }
    )
    outcomes.set(scope, outcome)
    evict()
    return outcome
  }

  async function join(scope: string, outcome: Outcome, ctx: Context): Promise<PaymentResponse> {
    outcome.waiters++
    try {
      return await raceAbort(outcome.promise, ctx.signal)
    } finally {
      outcome.waiters--
      if (outcome.waiters === 0 && !outcome.settled && !outcome.controller.signal.aborted) {
        // Every caller left before the charge settled
        if (outcomes.get(scope) === outcome) outcomes.delete(scope)
        outcome.controller.abort(Errors.cancelled('All callers left'))
      }
    }
  }

  return {
    async processPayment(input, ctx) {
      const request = validate(paymentRequestSchema, input)
      const scope = idempotencyScope(request)
      if (scope === undefined) {
        return charge(request, ctx.signal, ctx.requestId)
      }

      const existing = lookup(scope)
      if (existing) {
        if (existing.fingerprint !== fingerprint(request)) {
          throw Errors.invalidRequest('idempotencyKey: already used for a different payment', {
            accountId: request.accountId,
          })
        }
        logger.debug({ requestId: ctx.requestId, accountId: request.accountId }, 'idempotent replay')
        return join(scope, existing, ctx)
      }

      return join(scope, begin(scope, request, ctx.requestId), ctx)
    },
  }
}
