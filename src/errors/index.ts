/**
 * Error Module
 *
 * Error class, factories and code definitions.
 */

export { CallError, isCallError } from './call-error.js'
export { Errors } from './factories.js'
export type { FieldIssue } from './factories.js'
export { normalizeError, abortReason } from './normalize.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  isKnownCode,
  getStatusForCode,
  isRetryable,
} from './codes.js'
