export { createSessionManager, DEFAULT_QUEUE_DEPTH } from './session-manager.js'
export { createChatHandler, CHAT_USER_METADATA_KEY } from './handler.js'
export {
  inboundMessageSchema,
  MAX_TEXT_LENGTH,
  MAX_USER_LENGTH,
} from './types.js'
export type {
  ChatMessage,
  InboundMessage,
  Session,
  SessionCloseInfo,
  SessionInfo,
  SessionManager,
  SessionManagerOptions,
  SessionState,
  OpenSessionOptions,
  ShutdownOptions,
  ShutdownSummary,
} from './types.js'
