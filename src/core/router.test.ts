/**
 * Router Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { createRegistry } from './registry.js'
import { createRouter, type RouterResult } from './router.js'
import { sleep } from './abort.js'
import { Errors } from '../errors/factories.js'
import { abortReason } from '../errors/normalize.js'
import { createStream, isAsyncIterable } from '../stream/message-stream.js'
import { createContext, type Context } from '../types/context.js'
import type { Envelope } from '../types/envelope.js'

function envelope(
  method: string,
  type: Envelope['type'],
  payload: unknown,
  options: Partial<Omit<Context, 'requestId'>> = {}
): Envelope {
  return {
    id: 'req-1',
    method,
    type,
    payload,
    metadata: {},
    context: createContext('req-1', { method, ...options }),
  }
}

function single(result: RouterResult): Envelope {
  if (isAsyncIterable<Envelope>(result)) throw new Error('expected a single envelope')
  return result
}

function frames(result: RouterResult): AsyncIterable<Envelope> {
  if (!isAsyncIterable<Envelope>(result)) throw new Error('expected a stream of envelopes')
  return result
}

async function collect(result: RouterResult): Promise<Envelope[]> {
  const out: Envelope[] = []
  for await (const frame of frames(result)) out.push(frame)
  return out
}

describe('Router', () => {
  describe('dispatch', () => {
    it('should answer NOT_FOUND for unknown methods', async () => {
      const router = createRouter(createRegistry())
      const result = single(await router.handle(envelope('svc.Missing', 'request', {})))

      expect(result.type).toBe('error')
      expect(result.payload).toMatchObject({ code: 'NOT_FOUND', status: 404, message: "Method 'svc.Missing' not found" })
    })

    it('should reject an envelope type that does not match the handler kind', async () => {
      const registry = createRegistry()
      registry.unary('svc.Unary', () => 'ok')
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Unary', 'stream:start', {})))
      expect(result.payload).toMatchObject({
        code: 'INVALID_REQUEST',
        message: "Method 'svc.Unary' is unary; cannot route envelope type 'stream:start'",
      })
    })

    it('should answer TIMEOUT when the deadline has already passed', async () => {
      const handler = vi.fn(() => 'ok')
      const registry = createRegistry()
      registry.unary('svc.Unary', handler)
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Unary', 'request', {}, { deadline: Date.now() - 1 })))
      expect(result.payload).toMatchObject({ code: 'TIMEOUT', message: 'Request deadline exceeded' })
      expect(handler).not.toHaveBeenCalled()
    })

    it('should run global interceptors before handler interceptors', async () => {
      const order: string[] = []
      const registry = createRegistry()
      registry.unary(
        'svc.Unary',
        () => {
          order.push('handler')
          return 'ok'
        },
        {
          interceptors: [
            async (_env, _ctx, next) => {
              order.push('local')
              return next()
            },
          ],
        }
      )
      const router = createRouter(registry)
      router.use(async (_env, _ctx, next) => {
        order.push('global')
        return next()
      })

      await router.handle(envelope('svc.Unary', 'request', {}))
      expect(order).toEqual(['global', 'local', 'handler'])
    })
  })

  describe('unary', () => {
    it('should wrap the handler result in a response envelope', async () => {
      const registry = createRegistry()
      registry.unary('svc.Echo', (input) => ({ echoed: input }))
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Echo', 'request', 'hi')))
      expect(result).toMatchObject({ id: 'req-1:response', type: 'response', payload: { echoed: 'hi' } })
      expect(router.calls.size).toBe(0)
    })

    it('should keep the code of a CallError', async () => {
      const registry = createRegistry()
      registry.unary('svc.Fail', () => {
        throw Errors.invalidRequest('amount: must be positive')
      })
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Fail', 'request', {})))
      expect(result.payload).toMatchObject({ code: 'INVALID_REQUEST', message: 'amount: must be positive' })
    })

    it('should report other failures as PROCESSING_FAILURE', async () => {
      const registry = createRegistry()
      registry.unary('svc.Fail', async () => {
        throw new Error('gateway unreachable')
      })
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Fail', 'request', {})))
      expect(result.payload).toMatchObject({ code: 'PROCESSING_FAILURE', status: 422, message: 'gateway unreachable' })
    })

    it('should time out and abort the handler signal', async () => {
      let observed: unknown
      const registry = createRegistry()
      registry.unary(
        'svc.Slow',
        (_input, ctx) =>
          new Promise((_resolve, reject) => {
            ctx.signal.addEventListener('abort', () => {
              observed = ctx.signal.reason
              reject(abortReason(ctx.signal))
            })
          }),
        { timeoutMs: 20 }
      )
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Slow', 'request', {})))
      expect(result.payload).toMatchObject({
        code: 'TIMEOUT',
        message: "Operation 'svc.Slow' timed out after 20ms",
      })
      expect(observed).toMatchObject({ code: 'TIMEOUT' })
    })

    it('should cancel in-flight calls on cancelAll', async () => {
      const registry = createRegistry()
      registry.unary('svc.Hang', (_input, ctx) => sleep(10_000, ctx.signal))
      const router = createRouter(registry)

      const pending = router.handle(envelope('svc.Hang', 'request', {}))
      await vi.waitFor(() => expect(router.calls.size).toBe(1))
      expect(router.cancelAll()).toBe(1)

      const result = single(await pending)
      expect(result.payload).toMatchObject({ code: 'CANCELLED', message: 'Server shutting down' })
    })
  })

  describe('server stream', () => {
    it('should frame items between start and end', async () => {
      const registry = createRegistry()
      registry.serverStream('svc.Count', async function* () {
        yield 1
        yield 2
      })
      const router = createRouter(registry)

      const out = await collect(await router.handle(envelope('svc.Count', 'stream:start', {})))
      expect(out.map((frame) => frame.type)).toEqual(['stream:start', 'stream:data', 'stream:data', 'stream:end'])
      expect(out.map((frame) => frame.id)).toEqual([
        'req-1:stream:start',
        'req-1:stream:data:1',
        'req-1:stream:data:2',
        'req-1:stream:end',
      ])
      expect(out.filter((frame) => frame.type === 'stream:data').map((frame) => frame.payload)).toEqual([1, 2])
    })

    it('should end an empty sequence without data frames', async () => {
      const registry = createRegistry()
      registry.serverStream('svc.Empty', async function* () {})
      const router = createRouter(registry)

      const out = await collect(await router.handle(envelope('svc.Empty', 'stream:start', {})))
      expect(out.map((frame) => frame.type)).toEqual(['stream:start', 'stream:end'])
    })

    it('should terminate with STREAM_PRODUCER_FAILURE after the items already sent', async () => {
      const registry = createRegistry()
      registry.serverStream('svc.Broken', async function* () {
        yield 'a'
        yield 'b'
        throw new Error('disk gone')
      })
      const router = createRouter(registry)

      const out = await collect(await router.handle(envelope('svc.Broken', 'stream:start', {})))
      expect(out.map((frame) => frame.type)).toEqual(['stream:start', 'stream:data', 'stream:data', 'stream:error'])
      expect(out[3]?.payload).toMatchObject({
        code: 'STREAM_PRODUCER_FAILURE',
        message: 'Stream producer failed: disk gone',
        details: { emitted: 2 },
      })
    })

    it('should answer a handler that fails before producing with a single error', async () => {
      const registry = createRegistry()
      registry.serverStream('svc.Strict', () => {
        throw Errors.invalidRequest('accountId: is required')
      })
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Strict', 'stream:start', {})))
      expect(result.type).toBe('error')
      expect(result.payload).toMatchObject({ code: 'INVALID_REQUEST', message: 'accountId: is required' })
    })

    it('should close the producer when the consumer stops early', async () => {
      let cleaned = false
      const registry = createRegistry()
      registry.serverStream('svc.Many', async function* () {
        try {
          for (let i = 0; ; i++) yield i
        } finally {
          cleaned = true
        }
      })
      const router = createRouter(registry)

      for await (const frame of frames(await router.handle(envelope('svc.Many', 'stream:start', {})))) {
        if (frame.type === 'stream:data') break
      }

      await vi.waitFor(() => expect(cleaned).toBe(true))
      expect(router.calls.size).toBe(0)
    })

    it('should terminate with CANCELLED when the client goes away', async () => {
      const client = new AbortController()
      const registry = createRegistry()
      registry.serverStream('svc.Slow', async function* (_input, ctx) {
        yield 'first'
        await sleep(10_000, ctx.signal)
        yield 'never'
      })
      const router = createRouter(registry)

      const iterator = frames(
        await router.handle(envelope('svc.Slow', 'stream:start', {}, { signal: client.signal }))
      )[Symbol.asyncIterator]()
      expect((await iterator.next()).value?.type).toBe('stream:start')
      expect((await iterator.next()).value?.payload).toBe('first')

      const next = iterator.next()
      client.abort()
      const frame = await next
      expect(frame.value?.type).toBe('stream:error')
      expect(frame.value?.payload).toMatchObject({ code: 'CANCELLED', message: 'Call cancelled by client' })
    })
  })

  describe('bidi stream', () => {
    it('should require an inbound stream', async () => {
      const registry = createRegistry()
      registry.bidiStream('svc.Echo', (input) => input)
      const router = createRouter(registry)

      const result = single(await router.handle(envelope('svc.Echo', 'stream:start', { not: 'a stream' })))
      expect(result.payload).toMatchObject({
        code: 'INVALID_REQUEST',
        message: 'Bidirectional call requires an inbound stream',
      })
    })

    it('should stream handler output for an inbound stream', async () => {
      const registry = createRegistry()
      registry.bidiStream('svc.Echo', (input) => input)
      const router = createRouter(registry)

      const inbound = createStream<string>()
      await inbound.write('x')
      await inbound.write('y')
      inbound.end()

      const out = await collect(await router.handle(envelope('svc.Echo', 'stream:start', inbound)))
      expect(out.map((frame) => frame.payload)).toEqual([null, 'x', 'y', null])
    })
  })
})
