/**
 * Server - composition root
 *
 * Wires the ledger, payment gateway, domain services, registry, router,
 * chat session manager and gRPC adapter into one runnable server.
 */

import { readFileSync } from 'node:fs'
import { createGrpcAdapter, type GrpcAdapter, type GrpcTlsOptions } from '../adapters/grpc.js'
import { createChatHandler } from '../chat/handler.js'
import { createSessionManager } from '../chat/session-manager.js'
import type { SessionManager, ShutdownSummary } from '../chat/types.js'
import type { ServerConfig, TlsConfig } from '../config/schema.js'
import { createRegistry, type Registry } from '../core/registry.js'
import { createRouter, type Router } from '../core/router.js'
import { createLoggingInterceptor } from '../middleware/logging.js'
import { createLedgerGateway } from '../payments/gateway.js'
import { createPaymentService } from '../payments/service.js'
import type { PaymentGateway } from '../payments/types.js'
import { Methods, PACKAGE_NAME, PROTO_PATH } from '../protocol.js'
import { createLedger } from '../transactions/ledger.js'
import { createTransactionService } from '../transactions/service.js'
import type { Ledger, TransactionSource } from '../transactions/types.js'
import type { Interceptor } from '../types/handlers.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('server')

/**
 * Collaborators that can be swapped, e.g. by tests
 */
export interface ServerDeps {
  ledger?: Ledger
  /** Defaults to a ledger-backed gateway */
  gateway?: PaymentGateway
  /** Defaults to the ledger */
  transactions?: TransactionSource
  sessions?: SessionManager
  /** Extra global interceptors, run after call logging */
  interceptors?: Interceptor[]
}

export interface StopSummary {
  chat: ShutdownSummary
  /** Calls still in flight when the transport was shut down */
  cancelledCalls: number
}

export interface TandemServer {
  /** Bind and serve; resolves with the bound address */
  start(): Promise<{ host: string; port: number }>
  /** Graceful shutdown; repeated calls share the first shutdown */
  stop(): Promise<StopSummary>
  readonly address: { host: string; port: number } | null
  readonly registry: Registry
  readonly router: Router
  readonly sessions: SessionManager
  readonly ledger: Ledger
  readonly adapter: GrpcAdapter
}

function readTls(tls: TlsConfig): GrpcTlsOptions {
  return {
    key: readFileSync(tls.keyPath),
    cert: readFileSync(tls.certPath),
    ca: tls.caPath === undefined ? undefined : readFileSync(tls.caPath),
    requireClientCert: tls.requireClientCert,
  }
}

/**
 * Create a server from configuration
 *
 * @example
 * ```typescript
 * const server = createServer(loadConfig())
 * const { port } = await server.start()
 * process.on('SIGTERM', () => void server.stop())
 * ```
 */
export function createServer(config: ServerConfig, deps: ServerDeps = {}): TandemServer {
  const ledger = deps.ledger ?? createLedger()
  const gateway = deps.gateway ?? createLedgerGateway(ledger)
  const payments = createPaymentService(gateway, { idempotencyTtlMs: config.payments.idempotencyTtlMs })
  const transactions = createTransactionService(deps.transactions ?? ledger)
  const sessions = deps.sessions ?? createSessionManager({ queueDepth: config.chat.queueDepth })

  const registry = createRegistry()
  registry.unary(Methods.processPayment, payments.processPayment, {
    description: 'Process one payment attempt',
    timeoutMs: config.payments.timeoutMs,
  })
  registry.serverStream(Methods.getTransactionHistory, transactions.getTransactionHistory, {
    description: 'Stream the transaction history of an account',
  })
  registry.bidiStream(Methods.chat, createChatHandler(sessions), {
    description: 'Broadcast chat room',
  })

  const router = createRouter(registry, {
    interceptors: [createLoggingInterceptor(), ...(deps.interceptors ?? [])],
    defaultUnaryTimeoutMs: config.payments.timeoutMs,
  })

  const adapter = createGrpcAdapter(router, {
    host: config.host,
    port: config.port,
    protoPath: PROTO_PATH,
    packageName: PACKAGE_NAME,
    tls: config.tls ? readTls(config.tls) : undefined,
    maxReceiveMessageLength: config.maxMessageBytes,
    maxSendMessageLength: config.maxMessageBytes,
  })

  let stopping: Promise<StopSummary> | undefined

  async function shutdown(): Promise<StopSummary> {
    const graceMs = config.shutdownGraceMs
    logger.info({ graceMs }, 'shutting down')

    const chat = await sessions.shutdown({ graceMs })
    const cancelledCalls = router.cancelAll('Server shutting down')
    await adapter.stop({ graceMs })

    const summary = { chat, cancelledCalls }
    logger.info(summary, 'shutdown complete')
    return summary
  }

  return {
    registry,
    router,
    sessions,
    ledger,
    adapter,

    get address() {
      return adapter.address
    },

    async start() {
      await adapter.start()
      const { address } = adapter
      if (!address) {
        throw new Error('gRPC adapter did not report a bound address')
      }
      logger.info({ ...address, methods: registry.list().map((meta) => meta.method) }, 'tandem started')
      return address
    },

    stop() {
      stopping ??= shutdown()
      return stopping
    },
  }
}
