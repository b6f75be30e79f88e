/**
 * Ledger-backed Payment Gateway
 *
 * In-process stand-in for a card processor: approves requests, records a
 * debit on the ledger and returns its id as the payment id.
 */

import { Errors } from '../errors/factories.js'
import { abortReason } from '../errors/normalize.js'
import { sleep } from '../core/abort.js'
import type { Ledger } from '../transactions/types.js'
import type { ChargeReceipt, PaymentGateway, PaymentRequest } from './types.js'

export interface LedgerGatewayOptions {
  /** Simulated processing time before the charge commits (ms) */
  latencyMs?: number
  /** Returns a decline reason for requests that must be refused */
  decline?: (request: PaymentRequest) => string | undefined
}

export function createLedgerGateway(ledger: Ledger, options: LedgerGatewayOptions = {}): PaymentGateway {
  const latencyMs = options.latencyMs ?? 0

  return {
    async charge(request: PaymentRequest, signal: AbortSignal): Promise<ChargeReceipt> {
      if (latencyMs > 0) {
        await sleep(latencyMs, signal)
      }
      if (signal.aborted) throw abortReason(signal)

      const declined = options.decline?.(request)
      if (declined) {
        throw Errors.processingFailure(declined, { accountId: request.accountId })
      }

      const record = ledger.append({
        accountId: request.accountId,
        amount: request.amount,
        currency: request.currency,
        kind: 'debit',
        description: request.description ?? 'payment',
      })

      return { paymentId: record.id, processedAt: record.occurredAt }
    },
  }
}
