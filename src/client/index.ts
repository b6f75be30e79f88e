export {
  createClient,
  type CallOptions,
  type ChatCall,
  type ChatInput,
  type ChatOptions,
  type ClientOptions,
  type HistoryInput,
  type PaymentInput,
  type TandemClient,
} from './client.js'
export { fromServiceError, isServiceError } from './errors.js'
