/**
 * Abort Helper Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { raceAbort, sleep, startTimer } from './abort.js'

describe('sleep', () => {
  it('should remove every abort listener it added once the delay passes', async () => {
    const controller = new AbortController()
    const add = vi.spyOn(controller.signal, 'addEventListener')
    const remove = vi.spyOn(controller.signal, 'removeEventListener')

    await sleep(1, controller.signal)

    expect(add).toHaveBeenCalled()
    for (const [type, listener] of add.mock.calls) {
      expect(remove).toHaveBeenCalledWith(type, listener)
    }
  })

  it('should reject early with the abort reason', async () => {
    const controller = new AbortController()
    const pending = sleep(10_000, controller.signal)
    controller.abort(new Error('stop'))

    await expect(pending).rejects.toThrow('stop')
  })
})

describe('raceAbort', () => {
  it('should settle with the promise when the signal stays quiet', async () => {
    await expect(raceAbort(Promise.resolve(7), new AbortController().signal)).resolves.toBe(7)
  })

  it('should reject at once for an already aborted signal', async () => {
    const controller = new AbortController()
    controller.abort(new Error('gone'))

    await expect(raceAbort(new Promise<never>(() => undefined), controller.signal)).rejects.toThrow('gone')
  })
})

describe('startTimer', () => {
  it('should not fire once cleared', async () => {
    const onExpire = vi.fn()
    const clear = startTimer(1, onExpire)
    clear()

    await sleep(5)
    expect(onExpire).not.toHaveBeenCalled()
  })
})
