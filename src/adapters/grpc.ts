/**
 * gRPC Adapter
 *
 * Serves the router over gRPC with proto-based service definitions. Each
 * gRPC call becomes one envelope; router output is written back with
 * transport backpressure honored (a full socket suspends the producer).
 */

import { once } from 'node:events'
import * as grpc from '@grpc/grpc-js'
import * as protoLoader from '@grpc/proto-loader'
import { Errors } from '../errors/factories.js'
import { startTimer } from '../core/abort.js'
import type { Router } from '../core/router.js'
import type { Context, Envelope, ErrorPayload } from '../types/index.js'
import { createContext } from '../types/context.js'
import { isErrorEnvelope } from '../types/envelope.js'
import { createStream, isAsyncIterable } from '../stream/message-stream.js'
import { sid } from '../utils/id.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('grpc')

/** Trailing metadata key carrying the exact error code */
export const ERROR_CODE_METADATA_KEY = 'tandem-error-code'

/** Loader options shared by server and client */
export const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
}

const DEFAULT_INBOUND_HIGH_WATER_MARK = 16

export interface GrpcTlsOptions {
  key: string | Buffer
  cert: string | Buffer
  ca?: string | Buffer
  requireClientCert?: boolean
}

export interface GrpcMethodInfo {
  serviceName: string
  methodName: string
  fullName: string
  requestStream: boolean
  responseStream: boolean
}

export interface GrpcAdapterOptions {
  port: number
  host?: string
  protoPath: string | string[]
  packageName?: string
  tls?: GrpcTlsOptions
  maxReceiveMessageLength?: number
  maxSendMessageLength?: number
  /** Inbound buffer per bidirectional call before the socket is paused */
  inboundHighWaterMark?: number
}

export interface GrpcStopOptions {
  /** How long in-flight calls may take before the server is forced down (ms) */
  graceMs?: number
}

export interface GrpcAdapter {
  start(): Promise<void>
  stop(options?: GrpcStopOptions): Promise<void>
  readonly server: grpc.Server | null
  readonly address: { host: string; port: number } | null
  /** Methods served, by fully-qualified name */
  readonly methods: GrpcMethodInfo[]
}

type WritableCall = grpc.ServerWritableStream<unknown, unknown> | grpc.ServerDuplexStream<unknown, unknown>

/**
 * What every server call shape offers for building a context
 */
export interface SurfaceCall {
  metadata: grpc.Metadata
  readonly cancelled: boolean
  getDeadline(): Date | number
  on(event: 'cancelled' | 'close', listener: () => void): unknown
}

/**
 * Map an error code to a gRPC status
 */
export function mapErrorCodeToStatus(code: string): grpc.status {
  switch (code) {
    case 'INVALID_REQUEST':
      return grpc.status.INVALID_ARGUMENT
    case 'PROCESSING_FAILURE':
      return grpc.status.FAILED_PRECONDITION
    case 'SESSION_ERROR':
      return grpc.status.ABORTED
    case 'TIMEOUT':
      return grpc.status.DEADLINE_EXCEEDED
    case 'CANCELLED':
      return grpc.status.CANCELLED
    case 'NOT_FOUND':
      return grpc.status.NOT_FOUND
    case 'UNAVAILABLE':
      return grpc.status.UNAVAILABLE
    case 'STREAM_PRODUCER_FAILURE':
    case 'INTERNAL_ERROR':
    default:
      return grpc.status.INTERNAL
  }
}

/**
 * Build a gRPC status error; the exact code travels in trailing metadata
 */
export function toServiceError(payload: Pick<ErrorPayload, 'code' | 'message'>): grpc.ServiceError {
  const metadata = new grpc.Metadata()
  metadata.set(ERROR_CODE_METADATA_KEY, payload.code)
  return Object.assign(new Error(payload.message), {
    code: mapErrorCodeToStatus(payload.code),
    details: payload.message,
    metadata,
  })
}

function metadataToRecord(metadata: grpc.Metadata): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(metadata.getMap())) {
    result[key] = Buffer.isBuffer(value) ? value.toString('base64') : value
  }
  return result
}

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value
}

function isNamespace(value: unknown): value is grpc.GrpcObject {
  // Message and enum definitions carry a `format` field; namespaces do not
  return typeof value === 'object' && value !== null && !('format' in value)
}

function collectServices(
  root: grpc.GrpcObject,
  prefix = ''
): Array<{ name: string; service: grpc.ServiceDefinition }> {
  const services: Array<{ name: string; service: grpc.ServiceDefinition }> = []

  for (const [key, value] of Object.entries(root)) {
    const name = prefix ? `${prefix}.${key}` : key
    if (isServiceConstructor(value)) {
      services.push({ name, service: value.service })
    } else if (isNamespace(value)) {
      services.push(...collectServices(value, name))
    }
  }

  return services
}

function selectPackage(root: grpc.GrpcObject, packageName?: string): grpc.GrpcObject {
  if (!packageName) return root
  let current = root
  for (const part of packageName.split('.').filter(Boolean)) {
    const next = current[part]
    if (!isNamespace(next)) {
      throw new Error(`Package '${packageName}' not found in proto definition`)
    }
    current = next
  }
  return current
}

/**
 * Load the services of a proto package
 */
export function loadServices(
  protoPath: string | string[],
  packageName?: string
): Array<{ name: string; service: grpc.ServiceDefinition }> {
  const definition = protoLoader.loadSync(Array.isArray(protoPath) ? protoPath : [protoPath], PROTO_LOADER_OPTIONS)
  const root = selectPackage(grpc.loadPackageDefinition(definition), packageName)
  return collectServices(root).map(({ name, service }) => ({
    name: packageName ? `${packageName}.${name}` : name,
    service,
  }))
}

/**
 * Wait for the socket to accept more data; false when the call was aborted first
 */
async function waitForDrain(call: WritableCall, signal: AbortSignal): Promise<boolean> {
  try {
    await once(call, 'drain', { signal })
    return true
  } catch (err) {
    if (signal.aborted) return false
    throw err
  }
}

/**
 * Per-call context; its signal aborts when the client cancels or the
 * connection drops
 */
export function createCallContext(call: SurfaceCall, method: GrpcMethodInfo): Context {
  const metadata = metadataToRecord(call.metadata)
  const controller = new AbortController()

  const deadline = call.getDeadline()
  const deadlineMs = deadline instanceof Date ? deadline.getTime() : deadline

  const ctx = createContext(metadata['x-request-id'] || sid(), {
    method: method.fullName,
    signal: controller.signal,
    deadline: Number.isFinite(deadlineMs) ? deadlineMs : undefined,
    metadata,
  })

  const abort = (): void => {
    if (!controller.signal.aborted) {
      controller.abort(Errors.cancelled('Call cancelled by client'))
    }
  }
  call.on('cancelled', abort)
  call.on('close', () => {
    if (call.cancelled) abort()
  })

  return ctx
}

export function createGrpcAdapter(router: Router, options: GrpcAdapterOptions): GrpcAdapter {
  const {
    port,
    host = '0.0.0.0',
    protoPath,
    packageName,
    tls,
    maxReceiveMessageLength,
    maxSendMessageLength,
    inboundHighWaterMark = DEFAULT_INBOUND_HIGH_WATER_MARK,
  } = options

  let server: grpc.Server | null = null
  let address: { host: string; port: number } | null = null
  let methods: GrpcMethodInfo[] = []

  function createServerCredentials(): grpc.ServerCredentials {
    if (!tls) {
      return grpc.ServerCredentials.createInsecure()
    }

    const keyCertPair = {
      private_key: typeof tls.key === 'string' ? Buffer.from(tls.key) : tls.key,
      cert_chain: typeof tls.cert === 'string' ? Buffer.from(tls.cert) : tls.cert,
    }
    const rootCerts = tls.ca === undefined ? null : typeof tls.ca === 'string' ? Buffer.from(tls.ca) : tls.ca

    return grpc.ServerCredentials.createSsl(rootCerts, [keyCertPair], tls.requireClientCert ?? false)
  }

  function createEnvelope(
    ctx: Context,
    type: Envelope['type'],
    payload: unknown
  ): Envelope {
    return {
      id: ctx.requestId,
      method: ctx.method,
      type,
      payload,
      metadata: ctx.metadata,
      context: ctx,
    }
  }

  function failStream(call: WritableCall, payload: ErrorPayload): void {
    if (call.cancelled) return
    call.emit('error', toServiceError(payload))
  }

  /**
   * Forward router frames to the call until a terminal frame, the client
   * going away or the producer finishing
   */
  async function pipeFrames(call: WritableCall, frames: AsyncIterable<Envelope>, ctx: Context): Promise<void> {
    for await (const frame of frames) {
      if (call.cancelled) return

      if (isErrorEnvelope(frame)) {
        failStream(call, frame.payload)
        return
      }

      if (frame.type === 'stream:data') {
        if (!call.write(frame.payload) && !(await waitForDrain(call, ctx.signal))) {
          return
        }
      } else if (frame.type === 'stream:end') {
        call.end()
        return
      }
    }
  }

  async function serveStream(call: WritableCall, ctx: Context, envelope: Envelope): Promise<void> {
    try {
      const result = await router.handle(envelope)
      if (isAsyncIterable(result)) {
        await pipeFrames(call, result, ctx)
      } else if (isErrorEnvelope(result)) {
        failStream(call, result.payload)
      } else {
        failStream(call, Errors.internal('Handler did not return a stream').toJSON())
      }
    } catch (err) {
      logger.error({ requestId: ctx.requestId, method: ctx.method, err }, 'stream call failed')
      failStream(call, Errors.internal(err instanceof Error ? err.message : 'Internal error').toJSON())
    }
  }

  async function handleUnary(
    call: grpc.ServerUnaryCall<unknown, unknown>,
    callback: grpc.sendUnaryData<unknown>,
    method: GrpcMethodInfo
  ): Promise<void> {
    const ctx = createCallContext(call, method)

    try {
      const result = await router.handle(createEnvelope(ctx, 'request', call.request))
      if (isAsyncIterable(result)) {
        callback(toServiceError(Errors.internal('Unary handler returned a stream')))
      } else if (isErrorEnvelope(result)) {
        callback(toServiceError(result.payload))
      } else {
        callback(null, result.payload)
      }
    } catch (err) {
      logger.error({ requestId: ctx.requestId, method: ctx.method, err }, 'unary call failed')
      callback(toServiceError(Errors.internal(err instanceof Error ? err.message : 'Internal error')))
    }
  }

  async function handleServerStream(
    call: grpc.ServerWritableStream<unknown, unknown>,
    method: GrpcMethodInfo
  ): Promise<void> {
    const ctx = createCallContext(call, method)
    await serveStream(call, ctx, createEnvelope(ctx, 'stream:start', call.request))
  }

  async function handleBidiStream(
    call: grpc.ServerDuplexStream<unknown, unknown>,
    method: GrpcMethodInfo
  ): Promise<void> {
    const ctx = createCallContext(call, method)
    const inbound = createStream<unknown>({ id: `${ctx.requestId}:in`, highWaterMark: inboundHighWaterMark })

    // The socket stays paused while the inbound buffer is full
    call.on('data', (chunk: unknown) => {
      call.pause()
      inbound.write(chunk).then(
        () => call.resume(),
        (err: unknown) => {
          logger.debug({ requestId: ctx.requestId, err }, 'inbound message dropped, stream closed')
        }
      )
    })
    call.on('end', () => inbound.end())
    call.on('error', (err: Error) => inbound.error(err))

    await serveStream(call, ctx, createEnvelope(ctx, 'stream:start', inbound))
  }

  function createImplementation(
    serviceName: string,
    serviceDef: grpc.ServiceDefinition
  ): grpc.UntypedServiceImplementation {
    const implementation: grpc.UntypedServiceImplementation = {}

    for (const [methodName, definition] of Object.entries(serviceDef)) {
      const info: GrpcMethodInfo = {
        serviceName,
        methodName,
        fullName: `${serviceName}.${methodName}`,
        requestStream: definition.requestStream,
        responseStream: definition.responseStream,
      }
      methods.push(info)

      if (!info.requestStream && !info.responseStream) {
        implementation[methodName] = (
          call: grpc.ServerUnaryCall<unknown, unknown>,
          callback: grpc.sendUnaryData<unknown>
        ) => {
          void handleUnary(call, callback, info)
        }
      } else if (!info.requestStream) {
        implementation[methodName] = (call: grpc.ServerWritableStream<unknown, unknown>) => {
          void handleServerStream(call, info)
        }
      } else if (!info.responseStream) {
        implementation[methodName] = (
          _call: grpc.ServerReadableStream<unknown, unknown>,
          callback: grpc.sendUnaryData<unknown>
        ) => {
          callback({ code: grpc.status.UNIMPLEMENTED, details: `Client streaming is not supported: ${info.fullName}` })
        }
      } else {
        implementation[methodName] = (call: grpc.ServerDuplexStream<unknown, unknown>) => {
          void handleBidiStream(call, info)
        }
      }
    }

    return implementation
  }

  return {
    get server() {
      return server
    },
    get address() {
      return address
    },
    get methods() {
      return [...methods]
    },

    async start(): Promise<void> {
      if (server) {
        throw new Error('gRPC server is already running')
      }

      const serverOptions: grpc.ServerOptions = {}
      if (maxReceiveMessageLength !== undefined) {
        serverOptions['grpc.max_receive_message_length'] = maxReceiveMessageLength
      }
      if (maxSendMessageLength !== undefined) {
        serverOptions['grpc.max_send_message_length'] = maxSendMessageLength
      }

      const services = loadServices(protoPath, packageName)
      if (services.length === 0) {
        throw new Error('No gRPC services found in proto definition')
      }

      const current = new grpc.Server(serverOptions)
      methods = []
      for (const service of services) {
        current.addService(service.service, createImplementation(service.name, service.service))
      }

      const boundPort = await new Promise<number>((resolve, reject) => {
        current.bindAsync(`${host}:${port}`, createServerCredentials(), (err, portNumber) => {
          if (err) {
            reject(err)
            return
          }
          resolve(portNumber)
        })
      })

      server = current
      address = { host, port: boundPort }
      logger.info({ host, port: boundPort, tls: Boolean(tls) }, 'gRPC server listening')
    },

    async stop(stopOptions: GrpcStopOptions = {}): Promise<void> {
      if (!server) return

      const current = server
      server = null
      address = null

      await new Promise<void>((resolve) => {
        const clearTimer = startTimer(stopOptions.graceMs ?? 5000, () => {
          logger.warn('gRPC graceful shutdown timed out, forcing')
          current.forceShutdown()
          resolve()
        })
        current.tryShutdown((err) => {
          clearTimer()
          if (err) {
            logger.warn({ err }, 'gRPC graceful shutdown failed, forcing')
            current.forceShutdown()
          }
          resolve()
        })
      })

      logger.info('gRPC server stopped')
    },
  }
}
