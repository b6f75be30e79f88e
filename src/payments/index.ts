export { createLedgerGateway, type LedgerGatewayOptions } from './gateway.js'
export {
  createPaymentService,
  DEFAULT_IDEMPOTENCY_TTL_MS,
  DEFAULT_MAX_IDEMPOTENCY_KEYS,
  type PaymentService,
  type PaymentServiceOptions,
} from './service.js'
export { paymentRequestSchema, MAX_DESCRIPTION_LENGTH } from './types.js'
export type {
  ChargeReceipt,
  PaymentGateway,
  PaymentRequest,
  PaymentResponse,
  PaymentStatus,
} from './types.js'
