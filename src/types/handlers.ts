/**
 * Handler Types
 *
 * Signatures for the three call shapes: unary, server stream and
 * bidirectional stream. Handlers receive the raw decoded payload and
 * validate it themselves.
 */

import type { Context } from './context.js'
import type { Envelope } from './envelope.js'
import type { MessageStream } from './stream.js'

/**
 * Unary handler - one request, one response
 */
export type UnaryHandler<TInput = unknown, TOutput = unknown> = (
  input: TInput,
  ctx: Context
) => Promise<TOutput> | TOutput

/**
 * Server stream handler - one request, a lazy sequence of responses
 */
export type ServerStreamHandler<TInput = unknown, TOutput = unknown> = (
  input: TInput,
  ctx: Context
) => AsyncIterable<TOutput>

/**
 * Bidirectional stream handler - both sides stream independently
 */
export type BidiStreamHandler<TInput = unknown, TOutput = unknown> = (
  input: MessageStream<TInput>,
  ctx: Context
) => AsyncIterable<TOutput>

/**
 * Call kind discriminator
 */
export type CallKind = 'unary' | 'server-stream' | 'bidi-stream'

/**
 * Interceptor function (middleware)
 *
 * Interceptors wrap handler invocation in an onion model. For stream calls
 * `next()` resolves with the response iterable once the handler has started.
 */
export type Interceptor = (
  envelope: Envelope,
  ctx: Context,
  next: () => Promise<unknown>
) => Promise<unknown>

/**
 * Handler metadata
 */
export interface HandlerMeta {
  /** Call shape */
  kind: CallKind

  /** Fully-qualified method name */
  method: string

  /** Description (for introspection) */
  description?: string

  /** Processing deadline for unary handlers (ms) */
  timeoutMs?: number
}

interface RegisteredBase {
  meta: HandlerMeta
  interceptors: Interceptor[]
}

/**
 * Registered handler entry
 */
export type RegisteredHandler =
  | (RegisteredBase & { kind: 'unary'; handler: UnaryHandler })
  | (RegisteredBase & { kind: 'server-stream'; handler: ServerStreamHandler })
  | (RegisteredBase & { kind: 'bidi-stream'; handler: BidiStreamHandler })
