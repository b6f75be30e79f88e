/**
 * Router - Envelope Dispatch
 *
 * Routes incoming envelopes to the registered handler, runs interceptors in
 * an onion model and turns every outcome into envelopes:
 *
 * - unary: exactly one `response` or exactly one `error`
 * - streams: `stream:start`, `stream:data`×N, then exactly one of
 *   `stream:end` / `stream:error`
 */

import type {
  Envelope,
  ErrorPayload,
  Interceptor,
  Context,
  MessageStream,
  RegisteredHandler,
} from '../types/index.js'
import { createResponseEnvelope, createErrorEnvelope } from '../types/envelope.js'
import { withSignal } from '../types/context.js'
import { Errors } from '../errors/factories.js'
import { isCallError } from '../errors/call-error.js'
import { normalizeError } from '../errors/normalize.js'
import { isAsyncIterable, isMessageStream } from '../stream/message-stream.js'
import { createCallTracker, type CallTracker, type TrackedCall } from './calls.js'
import { raceAbort, startTimer } from './abort.js'
import type { Registry } from './registry.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('router')

const DEFAULT_UNARY_TIMEOUT_MS = 30_000

/**
 * Router result - a single envelope or a lazy stream of envelopes
 */
export type RouterResult = Envelope | AsyncIterable<Envelope>

/**
 * Router options
 */
export interface RouterOptions {
  /** Global interceptors (run for all handlers) */
  interceptors?: Interceptor[]
  /** Deadline for unary handlers without their own timeoutMs */
  defaultUnaryTimeoutMs?: number
}

/**
 * Router interface
 */
export interface Router {
  /** Handle an incoming envelope */
  handle(envelope: Envelope): Promise<RouterResult>

  /** Add a global interceptor */
  use(interceptor: Interceptor): void

  /** In-flight call bookkeeping */
  readonly calls: CallTracker

  /** Abort every in-flight call (administrative shutdown) */
  cancelAll(reason?: string): number
}

/**
 * Build full interceptor chain with envelope and context
 */
function buildChain(
  envelope: Envelope,
  ctx: Context,
  interceptors: Interceptor[],
  finalHandler: () => Promise<unknown>
): () => Promise<unknown> {
  let chain = finalHandler

  for (let i = interceptors.length - 1; i >= 0; i--) {
    const interceptor = interceptors[i]
    if (!interceptor) continue
    const next = chain
    chain = () => interceptor(envelope, ctx, next)
  }

  return chain
}

function streamFrame(
  request: Envelope,
  type: 'stream:start' | 'stream:data' | 'stream:end',
  payload: unknown,
  seq?: number
): Envelope {
  return {
    id: seq === undefined ? `${request.id}:${type}` : `${request.id}:${type}:${seq}`,
    method: request.method,
    type,
    payload,
    metadata: {},
    context: request.context,
  }
}

/**
 * Payload for an error raised while producing a stream
 *
 * CallErrors keep their code; anything else is a producer failure.
 */
function streamErrorPayload(err: unknown, emitted: number): ErrorPayload {
  if (isCallError(err)) return err.toJSON()
  return Errors.streamProducerFailure(err, emitted).toJSON()
}

/**
 * Wrap a handler's output in envelope frames, pulling one item at a time
 *
 * Nothing is produced before the consumer asks for it, so a consumer that
 * waits on transport backpressure suspends the producer too.
 */
async function* wrapStreamInEnvelopes(
  request: Envelope,
  source: AsyncIterable<unknown>,
  call: TrackedCall,
  inbound?: MessageStream<unknown>
): AsyncGenerator<Envelope, void, undefined> {
  const iterator = source[Symbol.asyncIterator]()
  let emitted = 0
  let exhausted = false

  try {
    yield streamFrame(request, 'stream:start', null)

    try {
      while (true) {
        const next = await raceAbort(iterator.next(), call.signal)
        if (next.done) {
          exhausted = true
          break
        }
        emitted++
        yield streamFrame(request, 'stream:data', next.value, emitted)
      }
    } catch (err) {
      // A producer that threw is finished; one cut off by abort still needs return()
      exhausted = !call.signal.aborted
      const payload = streamErrorPayload(err, emitted)
      call.settle({ error: payload })
      yield createErrorEnvelope(
        request,
        payload.code,
        payload.message,
        payload.details,
        payload.status,
        'stream:error'
      )
      return
    }

    call.settle({})
    yield streamFrame(request, 'stream:end', null)
  } finally {
    // Consumer stopped early (transport closed) or the stream finished
    if (!call.terminal) {
      call.abort(Errors.cancelled('Stream consumer closed'))
      call.settle({ error: Errors.cancelled('Stream consumer closed').toJSON() })
    }
    if (!exhausted) {
      const closing = iterator.return?.()
      closing?.catch((err: unknown) => {
        logger.warn({ requestId: call.id, err }, 'stream producer failed while closing')
      })
    }
    inbound?.cancel('Call finished')
  }
}

/**
 * Create a new Router
 */
export function createRouter(registry: Registry, options: RouterOptions = {}): Router {
  const globalInterceptors: Interceptor[] = [...(options.interceptors ?? [])]
  const defaultUnaryTimeoutMs = options.defaultUnaryTimeoutMs ?? DEFAULT_UNARY_TIMEOUT_MS
  const tracker = createCallTracker()

  async function handleUnary(
    envelope: Envelope,
    registered: Extract<RegisteredHandler, { kind: 'unary' }>
  ): Promise<Envelope> {
    const { context } = envelope
    const call = tracker.begin(context.requestId, envelope.method, 'unary', context.signal)

    const timeoutMs = registered.meta.timeoutMs ?? defaultUnaryTimeoutMs
    const now = Date.now()
    const deadline = Math.min(now + timeoutMs, context.deadline ?? Infinity)
    const ctx: Context = { ...withSignal(context, call.signal), deadline }
    const effectiveTimeout = deadline - now

    // Aborting the call signal on expiry lets the handler abandon its side effect
    const clearTimer = startTimer(effectiveTimeout, () => {
      call.abort(Errors.timeout(envelope.method, effectiveTimeout))
    })

    const chain = buildChain(
      envelope,
      ctx,
      [...globalInterceptors, ...registered.interceptors],
      async () => registered.handler(envelope.payload, ctx)
    )

    call.activate()
    try {
      const result = await raceAbort(chain(), call.signal)
      call.settle({})
      return createResponseEnvelope(envelope, result)
    } catch (err) {
      const payload = normalizeError(err, 'PROCESSING_FAILURE')
      if (!isCallError(err)) {
        logger.warn({ requestId: call.id, method: envelope.method, err }, 'unary handler threw')
      }
      call.settle({ error: payload })
      return createErrorEnvelope(envelope, payload.code, payload.message, payload.details, payload.status)
    } finally {
      clearTimer()
    }
  }

  async function handleStream(
    envelope: Envelope,
    registered: Extract<RegisteredHandler, { kind: 'server-stream' | 'bidi-stream' }>
  ): Promise<RouterResult> {
    const { context, payload } = envelope
    const call = tracker.begin(context.requestId, envelope.method, registered.kind, context.signal)
    const ctx = withSignal(context, call.signal)

    let inbound: MessageStream<unknown> | undefined
    let invoke: () => Promise<unknown>

    if (registered.kind === 'server-stream') {
      invoke = async () => registered.handler(payload, ctx)
    } else {
      if (!isMessageStream(payload)) {
        const error = Errors.invalidRequest('Bidirectional call requires an inbound stream')
        call.settle({ error: error.toJSON() })
        return createErrorEnvelope(envelope, error.code, error.message)
      }
      const input = payload
      inbound = input
      invoke = async () => registered.handler(input, ctx)
    }

    const chain = buildChain(
      envelope,
      ctx,
      [...globalInterceptors, ...registered.interceptors],
      invoke
    )

    call.activate()
    try {
      const result = await chain()
      if (!isAsyncIterable(result)) {
        throw Errors.internal('Handler did not return a stream')
      }
      return wrapStreamInEnvelopes(envelope, result, call, inbound)
    } catch (err) {
      const errorPayload = normalizeError(err)
      call.settle({ error: errorPayload })
      inbound?.cancel('Call failed')
      return createErrorEnvelope(
        envelope,
        errorPayload.code,
        errorPayload.message,
        errorPayload.details,
        errorPayload.status
      )
    }
  }

  return {
    calls: tracker,

    use(interceptor: Interceptor): void {
      globalInterceptors.push(interceptor)
    },

    cancelAll(reason?: string): number {
      return tracker.cancelAll(reason)
    },

    async handle(envelope: Envelope): Promise<RouterResult> {
      const { method, type, context } = envelope

      if (context.deadline !== undefined && Date.now() >= context.deadline) {
        return createErrorEnvelope(envelope, 'TIMEOUT', 'Request deadline exceeded')
      }

      if (context.signal.aborted) {
        return createErrorEnvelope(envelope, 'CANCELLED', 'Request was cancelled')
      }

      const registered = registry.get(method)
      if (!registered) {
        return createErrorEnvelope(envelope, 'NOT_FOUND', `Method '${method}' not found`)
      }

      const expected = registered.kind === 'unary' ? 'request' : 'stream:start'
      if (type !== expected) {
        return createErrorEnvelope(
          envelope,
          'INVALID_REQUEST',
          `Method '${method}' is ${registered.kind}; cannot route envelope type '${type}'`
        )
      }

      if (registered.kind === 'unary') {
        return handleUnary(envelope, registered)
      }
      return handleStream(envelope, registered)
    },
  }
}
