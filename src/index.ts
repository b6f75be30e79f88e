/**
 * Tandem - multi-pattern RPC service over gRPC
 *
 * @example
 * ```typescript
 * import { createServer, loadConfig } from 'tandem'
 *
 * const server = createServer(loadConfig())
 * await server.start()
 * ```
 */

// === Server ===
export { createServer, type ServerDeps, type StopSummary, type TandemServer } from './server/index.js'
export { Methods, PACKAGE_NAME, PROTO_PATH, type MethodName } from './protocol.js'
export { loadConfig, ConfigError, envSchema, type ServerConfig, type TlsConfig } from './config/index.js'

// === Client ===
export * from './client/index.js'

// === Core ===
export { createRegistry, type Registry, type HandlerOptions, type UnaryOptions } from './core/registry.js'
export { createRouter, type Router, type RouterOptions, type RouterResult } from './core/router.js'
export {
  createCallTracker,
  type CallTracker,
  type TrackedCall,
  type CallSnapshot,
  type CallState,
} from './core/calls.js'
export { createStream, isAsyncIterable, isMessageStream } from './stream/index.js'
export { createGrpcAdapter, mapErrorCodeToStatus, type GrpcAdapter, type GrpcAdapterOptions } from './adapters/grpc.js'
export { createLoggingInterceptor, redactSensitiveHeaders, type LoggingOptions } from './middleware/logging.js'

// === Domains ===
export * from './chat/index.js'
export * from './payments/index.js'
export * from './transactions/index.js'

// === Errors ===
export * from './errors/index.js'

// === Types ===
export * from './types/index.js'

// === Utilities ===
export { createLogger, getLogger, type Logger } from './utils/logger.js'
export { validate } from './validation/parse.js'
