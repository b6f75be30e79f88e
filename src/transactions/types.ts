/**
 * Transaction Types
 */

import { z } from 'zod'

export type TransactionKind = 'debit' | 'credit'

/**
 * One ledger entry, read-only once recorded
 */
export interface TransactionRecord {
  id: string
  accountId: string
  amount: number
  currency: string
  kind: TransactionKind
  description: string
  /** ISO-8601 time the entry was recorded */
  occurredAt: string
}

/**
 * Entry to record; id and time are assigned by the ledger unless given
 */
export type NewTransaction = Omit<TransactionRecord, 'id' | 'occurredAt'> &
  Partial<Pick<TransactionRecord, 'id' | 'occurredAt'>>

export interface HistoryQuery {
  /** Maximum number of records to yield */
  limit?: number
  /** Only records that occurred at or after this ISO-8601 time */
  since?: string
}

/**
 * Where transaction history comes from
 *
 * Records are produced lazily in stored order. Implementations stop with
 * the signal's reason once it aborts.
 */
export interface TransactionSource {
  history(accountId: string, query: HistoryQuery, signal: AbortSignal): AsyncIterable<TransactionRecord>
}

/**
 * In-memory ledger
 */
export interface Ledger extends TransactionSource {
  append(entry: NewTransaction): TransactionRecord
  accounts(): string[]
  readonly size: number
}

export const MAX_HISTORY_LIMIT = 10_000

const isoTimestamp = z.string().datetime({ offset: true })

/**
 * History request as decoded from the wire
 *
 * Protobuf defaults (`limit: 0`, `since: ''`) mean "not set".
 */
export const historyRequestSchema = z.object({
  accountId: z.string().trim().min(1, 'is required'),
  limit: z
    .number()
    .int('must be an integer')
    .min(0, 'must not be negative')
    .max(MAX_HISTORY_LIMIT)
    .optional()
    .transform((limit) => limit || undefined),
  since: z
    .string()
    .optional()
    .refine((since) => !since || isoTimestamp.safeParse(since).success, 'must be an ISO-8601 timestamp')
    .transform((since) => since || undefined),
})

export type HistoryRequest = z.output<typeof historyRequestSchema>
