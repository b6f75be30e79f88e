/**
 * Session Manager
 *
 * Admits one session per bidirectional chat call and broadcasts every
 * accepted inbound message to all other open sessions.
 *
 * Delivery rules:
 * - Each destination has a bounded outbound queue (`queueDepth`).
 * - A message from session A is written to every destination before A's
 *   next message is read, so each destination sees A's messages in order.
 * - A full destination suspends only A's path to it: the other destinations
 *   already hold the message, and other sources are unaffected. A's inbound
 *   read waits until the slow destination has room.
 * - No ordering is promised between different sources.
 *
 * The registry is only mutated by `open` (add) and `close` (remove), both
 * synchronous; broadcasts iterate a snapshot.
 */

import { CallError, isCallError } from '../errors/call-error.js'
import { Errors } from '../errors/factories.js'
import { raceAbort, startTimer } from '../core/abort.js'
import { createStream } from '../stream/message-stream.js'
import type { Context } from '../types/context.js'
import type { MessageStream } from '../types/stream.js'
import { prefixedId } from '../utils/id.js'
import { validate } from '../validation/parse.js'
import { createLogger } from '../utils/logger.js'
import {
  inboundMessageSchema,
  type ChatMessage,
  type OpenSessionOptions,
  type Session,
  type SessionCloseInfo,
  type SessionInfo,
  type SessionManager,
  type SessionManagerOptions,
  type SessionState,
  type ShutdownOptions,
  type ShutdownSummary,
} from './types.js'

const logger = createLogger('chat')

export const DEFAULT_QUEUE_DEPTH = 32
const DEFAULT_GRACE_MS = 5000

/**
 * Internal per-session state
 */
interface SessionRecord {
  id: string
  name?: string
  state: SessionState
  inbound: MessageStream<unknown>
  outbound: MessageStream<ChatMessage>
  controller: AbortController
  upstream: AbortSignal
  onUpstreamAbort: () => void
  openedAt: number
  closedAt?: number
  received: number
  delivered: number
  discarded: number
  listeners: Array<(info: SessionCloseInfo) => void>
  closed: Promise<SessionCloseInfo>
  resolveClosed: (info: SessionCloseInfo) => void
}

export function createSessionManager(options: SessionManagerOptions = {}): SessionManager {
  const queueDepth = options.queueDepth ?? DEFAULT_QUEUE_DEPTH
  if (!Number.isInteger(queueDepth) || queueDepth < 1) {
    throw new RangeError(`queueDepth must be a positive integer, got ${queueDepth}`)
  }

  const sessions = new Map<string, SessionRecord>()
  let accepting = true

  function snapshotInfo(record: SessionRecord): SessionInfo {
    return {
      id: record.id,
      name: record.name,
      state: record.state,
      openedAt: record.openedAt,
      closedAt: record.closedAt,
      received: record.received,
      delivered: record.delivered,
      discarded: record.discarded,
      queued: record.outbound.bufferedAmount + record.outbound.pendingWrites,
    }
  }

  /**
   * open|draining → closed. The only place a session leaves the registry.
   */
  function close(record: SessionRecord, reason?: CallError): boolean {
    if (record.state === 'closed') return false

    record.state = 'closed'
    record.closedAt = Date.now()
    sessions.delete(record.id)
    record.upstream.removeEventListener('abort', record.onUpstreamAbort)

    record.controller.abort(reason ?? Errors.cancelled('Session closed'))
    if (reason) {
      record.outbound.error(reason)
    } else {
      record.outbound.cancel('Session closed')
    }
    record.inbound.cancel('Session closed')

    const info: SessionCloseInfo = { id: record.id, reason }
    const entry = {
      sessionId: record.id,
      received: record.received,
      delivered: record.delivered,
      discarded: record.discarded,
      durationMs: record.closedAt - record.openedAt,
      ...(reason && { code: reason.code, reason: reason.message }),
    }
    if (reason && reason.code !== 'CANCELLED') {
      logger.warn(entry, 'session closed with error')
    } else {
      logger.info(entry, 'session closed')
    }

    for (const listener of record.listeners.splice(0)) {
      try {
        listener(info)
      } catch (err) {
        logger.error({ sessionId: record.id, err }, 'session close listener threw')
      }
    }
    record.resolveClosed(info)
    return true
  }

  /**
   * open → draining: stop receiving broadcasts, flush what is queued
   */
  function drain(record: SessionRecord): void {
    if (record.state !== 'open') return

    record.state = 'draining'
    record.outbound.end()
    logger.debug(
      { sessionId: record.id, queued: record.outbound.bufferedAmount },
      'session draining'
    )
  }

  async function deliver(target: SessionRecord, message: ChatMessage): Promise<void> {
    try {
      await target.outbound.write(message)
      target.delivered++
    } catch (err) {
      if (target.state !== 'open') {
        // Destination went away while the write waited for room
        target.discarded++
        logger.debug(
          { sessionId: target.id, from: message.sessionId, state: target.state },
          'delivery discarded, destination closed'
        )
        return
      }
      close(target, Errors.sessionError(target.id, 'outbound', err))
    }
  }

  async function broadcast(source: SessionRecord, message: ChatMessage): Promise<void> {
    const targets = Array.from(sessions.values()).filter(
      (target) => target !== source && target.state === 'open'
    )
    if (targets.length === 0) return

    // Writes are issued together; each destination suspends independently
    const deliveries = targets.map((target) => deliver(target, message))
    await raceAbort(Promise.all(deliveries), source.controller.signal)
  }

  function accept(record: SessionRecord, raw: unknown): ChatMessage {
    const parsed = validate(inboundMessageSchema, raw, 'message')

    return {
      sessionId: record.id,
      user: parsed.user || record.name || 'anonymous',
      text: parsed.text,
      sentAt: new Date().toISOString(),
    }
  }

  /**
   * Inbound loop: FIFO read → validate → broadcast, until end-of-input
   */
  async function pump(record: SessionRecord): Promise<void> {
    try {
      while (record.state !== 'closed') {
        const chunk = await raceAbort(record.inbound.read(), record.controller.signal)
        if (chunk.done) break

        const message = accept(record, chunk.value)
        record.received++
        await broadcast(record, message)
      }
      drain(record)
    } catch (err) {
      if (record.state === 'closed') return
      close(record, isCallError(err) ? err : Errors.sessionError(record.id, 'inbound', err))
    }
  }

  function createHandle(record: SessionRecord): Session {
    return {
      id: record.id,
      name: record.name,

      get state() {
        return record.state
      },

      signal: record.controller.signal,
      closed: record.closed,

      messages(): AsyncIterable<ChatMessage> {
        return {
          async *[Symbol.asyncIterator]() {
            try {
              while (true) {
                const chunk = await record.outbound.read()
                if (chunk.done) break
                yield chunk.value
              }
            } finally {
              close(record)
            }
          },
        }
      },

      close(reason?: CallError): boolean {
        return close(record, reason)
      },

      onClose(listener) {
        if (record.state === 'closed') {
          record.closed.then(listener).catch((err: unknown) => {
            logger.error({ sessionId: record.id, err }, 'session close listener threw')
          })
          return
        }
        record.listeners.push(listener)
      },

      info() {
        return snapshotInfo(record)
      },
    }
  }

  const manager: SessionManager = {
    open(inbound: MessageStream<unknown>, ctx: Context, openOptions: OpenSessionOptions = {}): Session {
      if (!accepting) {
        throw Errors.unavailable('Chat is shutting down')
      }

      const id = prefixedId('sess')
      let resolveClosed: (info: SessionCloseInfo) => void = () => undefined
      const closed = new Promise<SessionCloseInfo>((resolve) => {
        resolveClosed = resolve
      })

      const record: SessionRecord = {
        id,
        name: openOptions.name || undefined,
        state: 'open',
        inbound,
        outbound: createStream<ChatMessage>({ id: `${id}:out`, highWaterMark: queueDepth }),
        controller: new AbortController(),
        upstream: ctx.signal,
        onUpstreamAbort: () => {
          close(record, Errors.cancelled('Connection lost'))
        },
        openedAt: Date.now(),
        received: 0,
        delivered: 0,
        discarded: 0,
        listeners: [],
        closed,
        resolveClosed,
      }
      const session = createHandle(record)

      sessions.set(id, record)
      logger.info({ sessionId: id, requestId: ctx.requestId, sessions: sessions.size }, 'session opened')

      if (ctx.signal.aborted) {
        close(record, Errors.cancelled('Connection lost'))
        return session
      }
      ctx.signal.addEventListener('abort', record.onUpstreamAbort, { once: true })

      // pump() settles every error itself by closing the session
      void pump(record)

      return session
    },

    get(id: string): Session | undefined {
      const record = sessions.get(id)
      return record ? createHandle(record) : undefined
    },

    list(): SessionInfo[] {
      return Array.from(sessions.values()).map(snapshotInfo)
    },

    get size() {
      return sessions.size
    },

    get accepting() {
      return accepting
    },

    async shutdown(shutdownOptions: ShutdownOptions = {}): Promise<ShutdownSummary> {
      const graceMs = shutdownOptions.graceMs ?? DEFAULT_GRACE_MS
      accepting = false

      const targets = Array.from(sessions.values())
      logger.info({ sessions: targets.length, graceMs }, 'chat shutdown started')
      for (const record of targets) {
        drain(record)
      }

      let clearTimer = (): void => undefined
      const graceExpired = new Promise<void>((resolve) => {
        clearTimer = startTimer(graceMs, resolve)
      })
      await Promise.race([Promise.all(targets.map((record) => record.closed)), graceExpired])
      clearTimer()

      let forced = 0
      for (const record of Array.from(sessions.values())) {
        if (close(record, Errors.unavailable('Server shutting down'))) forced++
      }

      const summary = { drained: targets.length - forced, forced }
      logger.info(summary, 'chat shutdown finished')
      return summary
    },
  }

  return manager
}
