/**
 * Payment Types
 */

import { z } from 'zod'

export const MAX_DESCRIPTION_LENGTH = 140

function hasAtMostTwoDecimals(value: number): boolean {
  return Math.abs(Math.round(value * 100) - value * 100) < 1e-6
}

/**
 * Payment request as decoded from the wire
 *
 * Protobuf defaults (`''`) for optional strings mean "not set".
 */
export const paymentRequestSchema = z.object({
  accountId: z.string().trim().min(1, 'is required'),
  amount: z
    .number({ invalid_type_error: 'must be a number' })
    .finite('must be finite')
    .positive('must be positive')
    .refine(hasAtMostTwoDecimals, 'must have at most two decimal places'),
  currency: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, 'must be a 3-letter currency code')
    .transform((currency) => currency.toUpperCase()),
  description: z
    .string()
    .max(MAX_DESCRIPTION_LENGTH)
    .optional()
    .transform((description) => description || undefined),
  idempotencyKey: z
    .string()
    .max(128)
    .optional()
    .transform((key) => key || undefined),
})

export type PaymentRequest = z.output<typeof paymentRequestSchema>

export type PaymentStatus = 'approved'

export interface PaymentResponse {
  id: string
  status: PaymentStatus
  accountId: string
  amount: number
  currency: string
  /** ISO-8601 time the charge was committed */
  processedAt: string
}

/**
 * Result of a successful charge
 */
export interface ChargeReceipt {
  paymentId: string
  processedAt: string
}

/**
 * Processor that settles a payment
 *
 * `charge` rejects with a CallError (PROCESSING_FAILURE for a decline) and
 * must not commit anything once `signal` has aborted.
 */
export interface PaymentGateway {
  charge(request: PaymentRequest, signal: AbortSignal): Promise<ChargeReceipt>
}
