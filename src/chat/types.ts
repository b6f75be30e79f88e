/**
 * Chat Types
 *
 * A chat call is a bidirectional stream. Each call owns one Session: an
 * inbound channel written only by the transport receive path and a bounded
 * outbound channel written only by broadcast delivery.
 */

import { z } from 'zod'
import type { CallError } from '../errors/call-error.js'
import type { Context } from '../types/context.js'
import type { MessageStream } from '../types/stream.js'

export const MAX_TEXT_LENGTH = 4096
export const MAX_USER_LENGTH = 64

/**
 * Message as sent by a client
 *
 * Unknown keys (including any client-supplied sessionId/sentAt) are dropped.
 */
export const inboundMessageSchema = z.object({
  user: z.string().max(MAX_USER_LENGTH).optional(),
  text: z.string().trim().min(1, 'must not be empty').max(MAX_TEXT_LENGTH),
})

export type InboundMessage = z.infer<typeof inboundMessageSchema>

/**
 * Message as delivered to other participants
 */
export interface ChatMessage {
  /** Session the message was accepted from */
  sessionId: string
  /** Display name */
  user: string
  text: string
  /** ISO-8601 acceptance time */
  sentAt: string
}

/**
 * Session liveness
 *
 * - `open`: both directions active, receives broadcasts
 * - `draining`: client finished sending; queued messages still flush
 * - `closed`: both directions terminated, removed from the registry
 */
export type SessionState = 'open' | 'draining' | 'closed'

export interface SessionInfo {
  id: string
  name?: string
  state: SessionState
  openedAt: number
  closedAt?: number
  /** Inbound messages accepted and broadcast */
  received: number
  /** Messages queued into this session's outbound channel */
  delivered: number
  /** Messages addressed to this session that were dropped because it closed */
  discarded: number
  /** Messages waiting in the outbound queue */
  queued: number
}

export interface SessionCloseInfo {
  id: string
  /** Absent for a clean close */
  reason?: CallError
}

export interface Session {
  readonly id: string
  readonly name?: string
  readonly state: SessionState

  /** Aborted when the session closes */
  readonly signal: AbortSignal

  /** Resolves once the session reaches `closed` */
  readonly closed: Promise<SessionCloseInfo>

  /**
   * Outbound messages for the transport to send
   *
   * Ends cleanly once a draining session has flushed its queue; rejects with
   * the close reason when the session fails. The session is closed when
   * iteration stops for any reason.
   */
  messages(): AsyncIterable<ChatMessage>

  /**
   * Close from any state; idempotent
   *
   * @returns false when the session was already closed
   */
  close(reason?: CallError): boolean

  /** Register a listener that runs once when the session closes */
  onClose(listener: (info: SessionCloseInfo) => void): void

  info(): SessionInfo
}

export interface OpenSessionOptions {
  /** Default display name for messages that carry none */
  name?: string
}

export interface ShutdownOptions {
  /** How long draining sessions may take before being force-closed (default: 5000) */
  graceMs?: number
}

export interface ShutdownSummary {
  drained: number
  forced: number
}

export interface SessionManagerOptions {
  /** Per-session outbound queue capacity (default: 32) */
  queueDepth?: number
}

export interface SessionManager {
  /**
   * Admit a session for one bidirectional call
   *
   * @throws CallError UNAVAILABLE once shutdown has begun
   */
  open(inbound: MessageStream<unknown>, ctx: Context, options?: OpenSessionOptions): Session

  get(id: string): Session | undefined

  list(): SessionInfo[]

  /** Number of registered (not yet closed) sessions */
  readonly size: number

  /** True until shutdown starts */
  readonly accepting: boolean

  /**
   * Stop admitting, drain every session, force-close what is left after the
   * grace window
   */
  shutdown(options?: ShutdownOptions): Promise<ShutdownSummary>
}
