/**
 * Abort helpers
 */

import { abortReason } from '../errors/normalize.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('abort')

/**
 * Settle with `promise`, or reject with the signal's reason as soon as the
 * signal aborts, whichever comes first. The listener is removed either way.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // The losing promise may still reject later
    promise.catch((err: unknown) => {
      logger.debug({ err }, 'abandoned operation failed after abort')
    })
    return Promise.reject(abortReason(signal))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal))
    }
    signal.addEventListener('abort', onAbort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}

/**
 * Run `onExpire` after `ms`; returns a function that clears the timer
 */
export function startTimer(ms: number, onExpire: () => void): () => void {
  const timer = setTimeout(onExpire, ms)
  timer.unref?.()
  return () => clearTimeout(timer)
}

/**
 * Resolve after `ms`, or reject early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  const delay = new Promise<void>((resolve) => {
    const onAbort = (): void => clearTimeout(timer)
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
  return signal ? raceAbort(delay, signal) : delay
}
