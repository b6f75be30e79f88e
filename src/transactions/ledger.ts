/**
 * In-memory Ledger
 *
 * Keeps records per account in insertion order. History is produced lazily
 * from a snapshot taken when iteration starts, so appends made while a
 * history stream is running do not show up in it.
 */

import { abortReason } from '../errors/normalize.js'
import { prefixedId } from '../utils/id.js'
import type { HistoryQuery, Ledger, NewTransaction, TransactionRecord } from './types.js'

/**
 * Create an in-memory ledger, optionally pre-filled
 *
 * @example
 * ```typescript
 * const ledger = createLedger([
 *   { accountId: 'acc-1', amount: 25, currency: 'EUR', kind: 'credit', description: 'top-up' },
 * ])
 * ```
 */
export function createLedger(seed: NewTransaction[] = []): Ledger {
  const byAccount = new Map<string, TransactionRecord[]>()
  let size = 0

  function append(entry: NewTransaction): TransactionRecord {
    const record: TransactionRecord = Object.freeze({
      ...entry,
      id: entry.id ?? prefixedId('txn'),
      occurredAt: entry.occurredAt ?? new Date().toISOString(),
    })

    const records = byAccount.get(record.accountId)
    if (records) {
      records.push(record)
    } else {
      byAccount.set(record.accountId, [record])
    }
    size++
    return record
  }

  for (const entry of seed) {
    append(entry)
  }

  return {
    append,

    accounts(): string[] {
      return Array.from(byAccount.keys())
    },

    get size() {
      return size
    },

    async *history(
      accountId: string,
      query: HistoryQuery,
      signal: AbortSignal
    ): AsyncGenerator<TransactionRecord, void, undefined> {
      const records = [...(byAccount.get(accountId) ?? [])]
      const since = query.since === undefined ? undefined : Date.parse(query.since)
      let yielded = 0

      for (const record of records) {
        if (signal.aborted) throw abortReason(signal)
        if (query.limit !== undefined && yielded >= query.limit) return
        if (since !== undefined && Date.parse(record.occurredAt) < since) continue

        yielded++
        yield record
      }
    },
  }
}
