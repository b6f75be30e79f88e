/**
 * MessageStream Implementation
 *
 * A bounded queue with backpressure, used for both directions of a call.
 *
 * Key features:
 * - Backpressure via highWaterMark (write() stays pending while the buffer is full)
 * - Pending writers complete in FIFO order
 * - AsyncIterator support (for await...of)
 * - Idempotent terminal transitions (end, error, cancel)
 */

import { sid } from '../utils/id.js'
import { CallError } from '../errors/call-error.js'
import type {
  MessageStream,
  StreamChunk,
  StreamOptions,
  StreamState,
} from '../types/stream.js'

const DEFAULT_HIGH_WATER_MARK = 16

/**
 * Pending reader - waiting for data
 */
interface PendingReader<T> {
  resolve: (chunk: StreamChunk<T>) => void
  reject: (err: Error) => void
}

/**
 * Pending writer - waiting for buffer space
 */
interface PendingWriter<T> {
  value: T
  resolve: () => void
  reject: (err: Error) => void
}

/**
 * Creates a new MessageStream
 */
export function createStream<T>(options: StreamOptions = {}): MessageStream<T> {
  const id = options.id ?? sid()
  const highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK

  if (!Number.isInteger(highWaterMark) || highWaterMark < 0) {
    throw new RangeError(`highWaterMark must be a non-negative integer, got ${highWaterMark}`)
  }

  let state: StreamState = 'open'
  let failure: Error | null = null

  // Values are boxed so an empty slot is distinguishable from an undefined value
  const buffer: Array<{ value: T }> = []
  const pendingReaders: PendingReader<T>[] = []
  const pendingWriters: PendingWriter<T>[] = []

  /**
   * Settle whatever can be settled given the current state
   */
  function flush(): void {
    if (state === 'errored') {
      const err = failure ?? new Error('Stream errored')
      for (let reader = pendingReaders.shift(); reader; reader = pendingReaders.shift()) {
        reader.reject(err)
      }
      for (let writer = pendingWriters.shift(); writer; writer = pendingWriters.shift()) {
        writer.reject(err)
      }
      return
    }

    // Match readers with buffered data
    while (pendingReaders.length > 0 && buffer.length > 0) {
      const reader = pendingReaders.shift()
      const slot = buffer.shift()
      if (!reader || !slot) break
      reader.resolve({ done: false, value: slot.value })
    }

    // Direct delivery: match readers with pending writers (for highWaterMark=0)
    while (pendingReaders.length > 0 && pendingWriters.length > 0) {
      const reader = pendingReaders.shift()
      const writer = pendingWriters.shift()
      if (!reader || !writer) break
      reader.resolve({ done: false, value: writer.value })
      writer.resolve()
    }

    // Move waiting writers into freed buffer space
    while (pendingWriters.length > 0 && buffer.length < highWaterMark) {
      const writer = pendingWriters.shift()
      if (!writer) break
      buffer.push({ value: writer.value })
      writer.resolve()
    }

    // Closing and drained: resolve remaining readers with done
    if (state === 'closing' && buffer.length === 0 && pendingWriters.length === 0) {
      state = 'closed'
      for (let reader = pendingReaders.shift(); reader; reader = pendingReaders.shift()) {
        reader.resolve({ done: true })
      }
    }
  }

  function fail(err: Error): void {
    if (state === 'closed' || state === 'errored') return
    state = 'errored'
    failure = err
    flush()
  }

  const stream: MessageStream<T> = {
    // === Reading ===

    read(): Promise<StreamChunk<T>> {
      return new Promise((resolve, reject) => {
        if (state === 'errored') {
          return reject(failure ?? new Error('Stream errored'))
        }

        if (state === 'closed') {
          return resolve({ done: true })
        }

        const slot = buffer.shift()
        if (slot) {
          // A slot freed up: admit the oldest waiting writer
          const writer = pendingWriters.shift()
          if (writer) {
            buffer.push({ value: writer.value })
            writer.resolve()
          }
          resolve({ done: false, value: slot.value })
          if (state === 'closing') flush()
          return
        }

        if (state === 'closing' && pendingWriters.length === 0) {
          state = 'closed'
          return resolve({ done: true })
        }

        pendingReaders.push({ resolve, reject })
        flush()
      })
    },

    [Symbol.asyncIterator](): AsyncIterator<T> {
      return {
        next: async (): Promise<IteratorResult<T>> => {
          const chunk = await stream.read()
          if (chunk.done) {
            return { done: true, value: undefined }
          }
          return { done: false, value: chunk.value }
        },
        return: async (): Promise<IteratorResult<T>> => {
          stream.cancel('Iterator return called')
          return { done: true, value: undefined }
        },
      }
    },

    // === Writing ===

    write(value: T): Promise<void> {
      return new Promise((resolve, reject) => {
        if (state !== 'open') {
          return reject(
            failure ?? new Error(`Cannot write to stream in state: ${state}`)
          )
        }

        // Fast path: hand straight to a waiting reader
        const reader = pendingReaders.shift()
        if (reader) {
          reader.resolve({ done: false, value })
          return resolve()
        }

        if (buffer.length < highWaterMark) {
          buffer.push({ value })
          return resolve()
        }

        // Buffer full - queue the write (backpressure)
        pendingWriters.push({ value, resolve, reject })
      })
    },

    end(): void {
      if (state !== 'open') return

      state = 'closing'
      flush()
    },

    error(err: Error): void {
      fail(err)
    },

    cancel(reason?: string): void {
      if (state === 'closed' || state === 'errored') return

      buffer.length = 0
      fail(new CallError('CANCELLED', reason ?? 'Stream cancelled'))
    },

    // === State ===

    get readable(): boolean {
      return state !== 'errored' && (state !== 'closed' || buffer.length > 0)
    },

    get writable(): boolean {
      return state === 'open'
    },

    get closed(): boolean {
      return state === 'closed'
    },

    get errored(): Error | null {
      return failure
    },

    id,
    highWaterMark,

    get bufferedAmount(): number {
      return buffer.length
    },

    get pendingWrites(): number {
      return pendingWriters.length
    },
  }

  return stream
}

/**
 * Check if a value is async iterable
 */
export function isAsyncIterable<T = unknown>(value: unknown): value is AsyncIterable<T> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value
}

/**
 * Check if a value is a MessageStream
 */
export function isMessageStream<T = unknown>(value: unknown): value is MessageStream<T> {
  return (
    isAsyncIterable(value) &&
    'read' in value &&
    typeof value.read === 'function' &&
    'write' in value &&
    typeof value.write === 'function' &&
    'cancel' in value &&
    typeof value.cancel === 'function'
  )
}
