/**
 * Context Types
 *
 * The Context carries per-call information from the transport into handlers:
 * correlation id, cancellation, deadline and protocol metadata.
 */

/**
 * Call context
 */
export interface Context {
  /** Request correlation ID */
  requestId: string

  /** Fully-qualified method name (e.g. `tandem.Payments.ProcessPayment`) */
  method: string

  /** Cancellation signal, aborted on client cancel, timeout or shutdown */
  signal: AbortSignal

  /** Call deadline (ms since epoch) */
  deadline?: number

  /** Protocol metadata (headers) - strings only */
  readonly metadata: Readonly<Record<string, string>>
}

/**
 * Create a new context with defaults
 */
export function createContext(
  requestId: string,
  options: Partial<Omit<Context, 'requestId'>> = {}
): Context {
  return {
    requestId,
    method: options.method ?? '',
    signal: options.signal ?? new AbortController().signal,
    deadline: options.deadline,
    metadata: options.metadata ?? {},
  }
}

/**
 * Create a derived context bound to another signal
 */
export function withSignal(ctx: Context, signal: AbortSignal): Context {
  return { ...ctx, signal }
}
