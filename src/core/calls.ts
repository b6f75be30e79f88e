/**
 * Call Tracker
 *
 * Owns the lifecycle of every in-flight call:
 * pending → active → completed | failed | cancelled.
 *
 * Each call gets its own AbortController linked to the transport signal, so
 * a client cancel, a timeout and an administrative shutdown all reach the
 * handler through the same `ctx.signal`.
 */

import type { CallKind } from '../types/handlers.js'
import type { ErrorPayload } from '../types/envelope.js'
import { CallError } from '../errors/call-error.js'
import { Errors } from '../errors/factories.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('calls')

export type CallState = 'pending' | 'active' | 'completed' | 'failed' | 'cancelled'

/**
 * Read-only view of a call
 */
export interface CallSnapshot {
  id: string
  method: string
  kind: CallKind
  state: CallState
  startedAt: number
  endedAt?: number
  error?: ErrorPayload
}

/**
 * Mutable handle held by the router for one call
 */
export interface TrackedCall {
  readonly id: string
  readonly method: string
  readonly kind: CallKind
  readonly state: CallState
  readonly signal: AbortSignal
  readonly terminal: boolean

  /** pending → active */
  activate(): void

  /** Abort the call's signal; the router settles it at the next suspension point */
  abort(reason: CallError): void

  /** Move to a terminal state; later calls are no-ops */
  settle(outcome: { error?: ErrorPayload }): void

  snapshot(): CallSnapshot
}

export interface CallTracker {
  /** Register a new pending call linked to the transport signal */
  begin(id: string, method: string, kind: CallKind, upstream: AbortSignal): TrackedCall

  /** Non-terminal calls */
  active(): CallSnapshot[]

  /** Abort every non-terminal call; returns how many were aborted */
  cancelAll(reason?: string): number

  readonly size: number
}

function isTerminal(state: CallState): boolean {
  return state === 'completed' || state === 'failed' || state === 'cancelled'
}

export function createCallTracker(): CallTracker {
  const calls = new Set<TrackedCall>()

  return {
    begin(id, method, kind, upstream) {
      const controller = new AbortController()
      const startedAt = Date.now()
      let state: CallState = 'pending'
      let endedAt: number | undefined
      let error: ErrorPayload | undefined

      const onUpstreamAbort = (): void => {
        call.abort(Errors.cancelled('Call cancelled by client'))
      }

      const call: TrackedCall = {
        id,
        method,
        kind,
        signal: controller.signal,

        get state() {
          return state
        },

        get terminal() {
          return isTerminal(state)
        },

        activate() {
          if (state === 'pending') state = 'active'
        },

        abort(reason) {
          if (!controller.signal.aborted) controller.abort(reason)
        },

        settle(outcome) {
          if (isTerminal(state)) return

          error = outcome.error
          state = !error ? 'completed' : error.code === 'CANCELLED' ? 'cancelled' : 'failed'
          endedAt = Date.now()
          calls.delete(call)
          upstream.removeEventListener('abort', onUpstreamAbort)

          const entry = {
            requestId: id,
            method,
            kind,
            state,
            durationMs: endedAt - startedAt,
            ...(error && { code: error.code }),
          }
          if (state === 'failed' && error && error.status >= 500) {
            logger.error({ ...entry, err: error.message }, 'call failed')
          } else {
            logger.debug(entry, 'call settled')
          }
        },

        snapshot() {
          return { id, method, kind, state, startedAt, endedAt, error }
        },
      }

      calls.add(call)

      if (upstream.aborted) {
        onUpstreamAbort()
      } else {
        upstream.addEventListener('abort', onUpstreamAbort, { once: true })
      }

      return call
    },

    active() {
      return Array.from(calls).map((call) => call.snapshot())
    },

    cancelAll(reason = 'Server shutting down') {
      const targets = Array.from(calls)
      for (const call of targets) {
        call.abort(new CallError('CANCELLED', reason))
      }
      return targets.length
    },

    get size() {
      return calls.size
    },
  }
}
