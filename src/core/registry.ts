/**
 * Registry - Handler Registration
 *
 * Stores unary, server-stream and bidi-stream handlers by fully-qualified
 * method name and exposes them for dispatch and introspection.
 */

import type {
  UnaryHandler,
  ServerStreamHandler,
  BidiStreamHandler,
  CallKind,
  HandlerMeta,
  RegisteredHandler,
  Interceptor,
} from '../types/handlers.js'

/**
 * Registration options shared by every call kind
 */
export interface HandlerOptions {
  description?: string
  interceptors?: Interceptor[]
}

/**
 * Unary registration options
 */
export interface UnaryOptions extends HandlerOptions {
  /** Processing deadline; falls back to the router default */
  timeoutMs?: number
}

/**
 * Registry interface
 */
export interface Registry {
  // === Registration ===

  /** Register a unary handler */
  unary<TOutput>(
    method: string,
    handler: UnaryHandler<unknown, TOutput>,
    options?: UnaryOptions
  ): void

  /** Register a server-stream handler */
  serverStream<TOutput>(
    method: string,
    handler: ServerStreamHandler<unknown, TOutput>,
    options?: HandlerOptions
  ): void

  /** Register a bidirectional-stream handler */
  bidiStream<TOutput>(
    method: string,
    handler: BidiStreamHandler<unknown, TOutput>,
    options?: HandlerOptions
  ): void

  // === Lookup ===

  /** Get a handler by method name */
  get(method: string): RegisteredHandler | undefined

  /** Check if a handler exists */
  has(method: string): boolean

  // === Introspection ===

  /** List all registered handlers */
  list(): HandlerMeta[]

  /** List handlers of one kind */
  listByKind(kind: CallKind): HandlerMeta[]
}

/**
 * Create a new Registry
 */
export function createRegistry(): Registry {
  const handlers = new Map<string, RegisteredHandler>()

  function assertFree(method: string): void {
    if (!method) {
      throw new Error('Method name must not be empty')
    }
    if (handlers.has(method)) {
      throw new Error(`Handler '${method}' already registered`)
    }
  }

  return {
    // === Registration ===

    unary<TOutput>(
      method: string,
      handler: UnaryHandler<unknown, TOutput>,
      options: UnaryOptions = {}
    ): void {
      assertFree(method)
      if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
        throw new Error(`Handler '${method}': timeoutMs must be positive`)
      }

      handlers.set(method, {
        kind: 'unary',
        handler,
        meta: {
          kind: 'unary',
          method,
          description: options.description,
          timeoutMs: options.timeoutMs,
        },
        interceptors: options.interceptors ?? [],
      })
    },

    serverStream<TOutput>(
      method: string,
      handler: ServerStreamHandler<unknown, TOutput>,
      options: HandlerOptions = {}
    ): void {
      assertFree(method)

      handlers.set(method, {
        kind: 'server-stream',
        handler,
        meta: {
          kind: 'server-stream',
          method,
          description: options.description,
        },
        interceptors: options.interceptors ?? [],
      })
    },

    bidiStream<TOutput>(
      method: string,
      handler: BidiStreamHandler<unknown, TOutput>,
      options: HandlerOptions = {}
    ): void {
      assertFree(method)

      handlers.set(method, {
        kind: 'bidi-stream',
        handler,
        meta: {
          kind: 'bidi-stream',
          method,
          description: options.description,
        },
        interceptors: options.interceptors ?? [],
      })
    },

    // === Lookup ===

    get(method: string): RegisteredHandler | undefined {
      return handlers.get(method)
    },

    has(method: string): boolean {
      return handlers.has(method)
    },

    // === Introspection ===

    list(): HandlerMeta[] {
      return Array.from(handlers.values()).map((h) => h.meta)
    },

    listByKind(kind: CallKind): HandlerMeta[] {
      return Array.from(handlers.values())
        .filter((h) => h.kind === kind)
        .map((h) => h.meta)
    },
  }
}
