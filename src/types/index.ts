// Stream types
export type {
  MessageStream,
  StreamChunk,
  StreamOptions,
  StreamState,
} from './stream.js'

// Envelope types
export type {
  Envelope,
  EnvelopeType,
  ErrorEnvelope,
  ErrorPayload,
} from './envelope.js'
export {
  createResponseEnvelope,
  createErrorEnvelope,
  isErrorEnvelope,
} from './envelope.js'

// Context types
export type { Context } from './context.js'
export { createContext, withSignal } from './context.js'

// Handler types
export type {
  UnaryHandler,
  ServerStreamHandler,
  BidiStreamHandler,
  CallKind,
  Interceptor,
  HandlerMeta,
  RegisteredHandler,
} from './handlers.js'
