/**
 * Server Integration Tests
 *
 * Real gRPC over loopback: server and client in the same process.
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import * as grpc from '@grpc/grpc-js'
import { createServer, type ServerDeps, type TandemServer } from './server.js'
import { createClient, type TandemClient } from '../client/client.js'
import type { ServerConfig } from '../config/schema.js'
import type { PaymentGateway } from '../payments/types.js'
import { createLedger } from '../transactions/ledger.js'
import type { NewTransaction, TransactionSource } from '../transactions/types.js'

const baseConfig: ServerConfig = {
  host: '127.0.0.1',
  port: 0,
  chat: { queueDepth: 32 },
  payments: { timeoutMs: 2000, idempotencyTtlMs: 60_000 },
  shutdownGraceMs: 1000,
  maxMessageBytes: 4 * 1024 * 1024,
}

let server: TandemServer | null = null
let client: TandemClient | null = null

async function start(
  deps: ServerDeps = {},
  overrides: Partial<ServerConfig> = {}
): Promise<{ server: TandemServer; client: TandemClient }> {
  server = createServer({ ...baseConfig, ...overrides }, deps)
  const { host, port } = await server.start()
  client = createClient(`${host}:${port}`)
  return { server, client }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const item of items) out.push(item)
  return out
}

afterEach(async () => {
  client?.close()
  client = null
  if (server) {
    await server.stop()
    server = null
  }
})

describe('processPayment', () => {
  it('should approve a payment and record it in the history', async () => {
    const { client } = await start()

    const payment = await client.processPayment({
      accountId: 'acc-1',
      amount: 12.5,
      currency: 'eur',
      description: 'lunch',
    })

    expect(payment).toEqual({
      id: expect.stringMatching(/^txn_/),
      status: 'approved',
      accountId: 'acc-1',
      amount: 12.5,
      currency: 'EUR',
      processedAt: expect.any(String),
    })

    const history = await collect(client.getTransactionHistory({ accountId: 'acc-1' }))
    expect(history).toEqual([
      {
        id: payment.id,
        accountId: 'acc-1',
        amount: 12.5,
        currency: 'EUR',
        kind: 'debit',
        description: 'lunch',
        occurredAt: payment.processedAt,
      },
    ])
  })

  it('should reject invalid input with INVALID_REQUEST', async () => {
    const { client } = await start()

    await expect(client.processPayment({ accountId: 'acc-1', amount: -1, currency: 'EUR' })).rejects.toMatchObject({
      code: 'INVALID_REQUEST',
      message: 'amount: must be positive',
      details: { grpcStatus: grpc.status.INVALID_ARGUMENT },
    })
  })

  it('should surface a declined charge as PROCESSING_FAILURE', async () => {
    const gateway: PaymentGateway = {
      charge: vi.fn<PaymentGateway['charge']>().mockRejectedValue(new Error('card declined')),
    }
    const { client } = await start({ gateway })

    await expect(client.processPayment({ accountId: 'acc-1', amount: 5, currency: 'EUR' })).rejects.toMatchObject({
      code: 'PROCESSING_FAILURE',
      details: { grpcStatus: grpc.status.FAILED_PRECONDITION },
    })
  })

  it('should time out a charge that outlives the processing deadline', async () => {
    const gateway: PaymentGateway = {
      charge: (_request, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true })
        }),
    }
    const { client } = await start({ gateway }, { payments: { timeoutMs: 50, idempotencyTtlMs: 60_000 } })

    await expect(client.processPayment({ accountId: 'acc-1', amount: 5, currency: 'EUR' })).rejects.toMatchObject({
      code: 'TIMEOUT',
      details: { grpcStatus: grpc.status.DEADLINE_EXCEEDED },
    })
  })
})

describe('getTransactionHistory', () => {
  it('should stream every stored record of an account in stored order, then end', async () => {
    const seed: NewTransaction[] = [
      { id: 't1', accountId: 'A1', amount: 100, currency: 'EUR', kind: 'credit', description: 'salary', occurredAt: '2026-02-01T09:00:00.000Z' },
      { id: 't2', accountId: 'A2', amount: 3, currency: 'EUR', kind: 'debit', description: 'other', occurredAt: '2026-02-01T10:00:00.000Z' },
      { id: 't3', accountId: 'A1', amount: 20, currency: 'EUR', kind: 'debit', description: 'rent', occurredAt: '2026-02-02T09:00:00.000Z' },
      { id: 't4', accountId: 'A1', amount: 5, currency: 'EUR', kind: 'debit', description: 'coffee', occurredAt: '2026-02-03T09:00:00.000Z' },
    ]
    const { client } = await start({ ledger: createLedger(seed) })

    const records = await collect(client.getTransactionHistory({ accountId: 'A1' }))

    expect(records.map((record) => [record.id, record.description])).toEqual([
      ['t1', 'salary'],
      ['t3', 'rent'],
      ['t4', 'coffee'],
    ])
    expect(records[1]).toEqual({
      id: 't3',
      accountId: 'A1',
      amount: 20,
      currency: 'EUR',
      kind: 'debit',
      description: 'rent',
      occurredAt: '2026-02-02T09:00:00.000Z',
    })
  })

  it('should deliver a history larger than the transport buffers in order', async () => {
    const count = 3000
    const seed: NewTransaction[] = Array.from({ length: count }, (_, i): NewTransaction => ({
      id: `t${i}`,
      accountId: 'A1',
      amount: i + 1,
      currency: 'EUR',
      kind: 'debit',
      description: `${i}:${'x'.repeat(1000)}`,
      occurredAt: '2026-02-01T09:00:00.000Z',
    }))
    const { client } = await start({ ledger: createLedger(seed) })

    const records = client.getTransactionHistory({ accountId: 'A1' })[Symbol.asyncIterator]()
    const first = await records.next()
    // Let the server fill the connection while nothing is read
    await delay(100)

    const ids: string[] = first.done ? [] : [first.value.id]
    for (let next = await records.next(); !next.done; next = await records.next()) {
      ids.push(next.value.id)
    }

    expect(ids).toHaveLength(count)
    expect(ids).toEqual(seed.map((record) => record.id))
  })

  it('should finish without items for an unknown account', async () => {
    const { client } = await start()
    expect(await collect(client.getTransactionHistory({ accountId: 'acc-404' }))).toEqual([])
  })

  it('should deliver items sent before a producer failure', async () => {
    const transactions: TransactionSource = {
      async *history(accountId) {
        yield {
          id: 't1',
          accountId,
          amount: 1,
          currency: 'EUR',
          kind: 'credit',
          description: 'one',
          occurredAt: '2026-01-01T00:00:00.000Z',
        }
        throw new Error('replica offline')
      },
    }
    const { client } = await start({ transactions })

    const received: string[] = []
    await expect(
      (async () => {
        for await (const record of client.getTransactionHistory({ accountId: 'acc-1' })) {
          received.push(record.id)
        }
      })()
    ).rejects.toMatchObject({
      code: 'STREAM_PRODUCER_FAILURE',
      message: 'Stream producer failed: replica offline',
    })
    expect(received).toEqual(['t1'])
  })
})

describe('chat', () => {
  it('should broadcast to other participants in send order', async () => {
    const { server, client } = await start()
    const alice = client.chat({ user: 'alice' })
    const bob = client.chat({ user: 'bob' })
    await vi.waitFor(() => expect(server.sessions.size).toBe(2))

    await alice.send({ text: 'one' })
    await alice.send({ text: 'two' })

    const inbox = bob.messages[Symbol.asyncIterator]()
    const first = await inbox.next()
    const second = await inbox.next()
    expect([first.value?.text, second.value?.text]).toEqual(['one', 'two'])
    expect(first.value).toMatchObject({ user: 'alice', sessionId: expect.any(String), sentAt: expect.any(String) })

    alice.end()
    bob.end()
    expect(await collect(alice.messages)).toEqual([])
    expect((await inbox.next()).done).toBe(true)
    await vi.waitFor(() => expect(server.sessions.size).toBe(0))
  })

  it('should end idle sessions on shutdown', async () => {
    const { server, client } = await start()
    client.chat({ user: 'carol' })
    await vi.waitFor(() => expect(server.sessions.size).toBe(1))

    const summary = await server.stop()
    expect(summary.chat).toEqual({ drained: 1, forced: 0 })
    expect(await server.stop()).toBe(summary)
  })
})
