import type { BidiStreamHandler } from '../types/handlers.js'
import type { ChatMessage, SessionManager } from './types.js'

/** Metadata key carrying the default display name for a chat call */
export const CHAT_USER_METADATA_KEY = 'x-chat-user'

/**
 * Bidi handler that admits one session per call and streams back what the
 * other participants say
 */
export function createChatHandler(manager: SessionManager): BidiStreamHandler<unknown, ChatMessage> {
  return (input, ctx) => {
    const session = manager.open(input, ctx, { name: ctx.metadata[CHAT_USER_METADATA_KEY] })
    return session.messages()
  }
}
