export { createLedger } from './ledger.js'
export { createTransactionService, type TransactionService } from './service.js'
export { historyRequestSchema, MAX_HISTORY_LIMIT } from './types.js'
export type {
  HistoryQuery,
  HistoryRequest,
  Ledger,
  NewTransaction,
  TransactionKind,
  TransactionRecord,
  TransactionSource,
} from './types.js'
