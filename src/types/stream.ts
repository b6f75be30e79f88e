/**
 * MessageStream Types
 *
 * Bounded stream abstraction with backpressure.
 */

/**
 * Result of a read operation
 */
export type StreamChunk<T> =
  | { done: false; value: T }
  | { done: true; value?: undefined }

/**
 * Stream configuration options
 */
export interface StreamOptions {
  /** Stream ID (auto-generated if not provided) */
  id?: string
  /** Max items in buffer before backpressure kicks in (default: 16) */
  highWaterMark?: number
}

/**
 * Stream state
 */
export type StreamState = 'open' | 'closing' | 'closed' | 'errored'

/**
 * MessageStream interface - bounded queue with backpressure
 */
export interface MessageStream<T> extends AsyncIterable<T> {
  // === Reading ===

  /** Read next chunk (resolves when data available or stream ends) */
  read(): Promise<StreamChunk<T>>

  // === Writing ===

  /** Write value (resolves when buffer has space - backpressure) */
  write(value: T): Promise<void>

  /** Signal end of writes (no more data coming) */
  end(): void

  /** Signal error (terminates stream) */
  error(err: Error): void

  /** Cancel stream with optional reason, dropping buffered data */
  cancel(reason?: string): void

  // === State ===

  /** Can read from stream */
  readonly readable: boolean

  /** Can write to stream */
  readonly writable: boolean

  /** Stream ended and fully drained */
  readonly closed: boolean

  /** Error if stream errored */
  readonly errored: Error | null

  /** Stream ID */
  readonly id: string

  /** Number of items currently buffered */
  readonly bufferedAmount: number

  /** Number of writers waiting for buffer space */
  readonly pendingWrites: number

  /** Buffer capacity */
  readonly highWaterMark: number
}
