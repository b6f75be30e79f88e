/**
 * Transaction History Service
 *
 * Server-stream domain: validates the request up front, then yields the
 * account's records verbatim and in source order.
 */

import { isCallError } from '../errors/call-error.js'
import { Errors } from '../errors/factories.js'
import { abortReason } from '../errors/normalize.js'
import type { Context } from '../types/context.js'
import { validate } from '../validation/parse.js'
import { createLogger } from '../utils/logger.js'
import {
  historyRequestSchema,
  type HistoryRequest,
  type TransactionRecord,
  type TransactionSource,
} from './types.js'

const logger = createLogger('transactions')

export interface TransactionService {
  /**
   * Stream an account's history
   *
   * @throws CallError INVALID_REQUEST, synchronously, before anything is produced
   */
  getTransactionHistory(input: unknown, ctx: Context): AsyncIterable<TransactionRecord>
}

export function createTransactionService(source: TransactionSource): TransactionService {
  async function* produce(
    request: HistoryRequest,
    ctx: Context
  ): AsyncGenerator<TransactionRecord, void, undefined> {
    const { accountId, limit, since } = request
    let emitted = 0

    try {
      for await (const record of source.history(accountId, { limit, since }, ctx.signal)) {
        if (ctx.signal.aborted) throw abortReason(ctx.signal)
        emitted++
        yield record
      }
    } catch (err) {
      if (isCallError(err)) throw err
      logger.warn({ requestId: ctx.requestId, accountId, emitted, err }, 'transaction source failed')
      throw Errors.streamProducerFailure(err, emitted)
    }

    logger.debug({ requestId: ctx.requestId, accountId, emitted }, 'history streamed')
  }

  return {
    getTransactionHistory(input, ctx) {
      const request = validate(historyRequestSchema, input)
      return produce(request, ctx)
    },
  }
}
