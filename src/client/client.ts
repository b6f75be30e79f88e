/**
 * Tandem Client
 *
 * Typed client over the same proto the server loads. Responses are checked
 * against their schemas and failures surface as CallError.
 */

import { once } from 'node:events'
import * as grpc from '@grpc/grpc-js'
import type { z } from 'zod'
import { loadServices } from '../adapters/grpc.js'
import { CallError } from '../errors/call-error.js'
import type { ChatMessage } from '../chat/types.js'
import type { PaymentResponse } from '../payments/types.js'
import type { TransactionRecord } from '../transactions/types.js'
import { PACKAGE_NAME, PROTO_PATH } from '../protocol.js'
import { createLogger } from '../utils/logger.js'
import { fromServiceError } from './errors.js'
import { chatMessageSchema, paymentResponseSchema, transactionRecordSchema } from './schemas.js'

const logger = createLogger('client')

export interface PaymentInput {
  accountId: string
  amount: number
  currency: string
  description?: string
  idempotencyKey?: string
}

export interface HistoryInput {
  accountId: string
  limit?: number
  since?: string
}

export interface ChatInput {
  user?: string
  text: string
}

export interface CallOptions {
  /** Relative deadline (ms) */
  deadlineMs?: number
  /** Extra request metadata */
  metadata?: Record<string, string>
}

export interface ChatOptions extends CallOptions {
  /** Default display name for messages without `user` */
  user?: string
}

/**
 * Client side of a chat call
 */
export interface ChatCall {
  /** Send one message; waits while the connection is saturated */
  send(message: ChatInput): Promise<void>
  /** Half-close: no more messages from this side */
  end(): void
  /** Messages from other participants, until the server ends the call */
  readonly messages: AsyncIterable<ChatMessage>
  /** Abort the call */
  cancel(): void
}

export interface TandemClient {
  processPayment(request: PaymentInput, options?: CallOptions): Promise<PaymentResponse>
  getTransactionHistory(request: HistoryInput, options?: CallOptions): AsyncIterable<TransactionRecord>
  chat(options?: ChatOptions): ChatCall
  close(): void
}

export interface ClientOptions {
  credentials?: grpc.ChannelCredentials
  protoPath?: string
  channelOptions?: grpc.ChannelOptions
}

function toMetadata(values: Record<string, string> = {}): grpc.Metadata {
  const metadata = new grpc.Metadata()
  for (const [key, value] of Object.entries(values)) {
    metadata.set(key, value)
  }
  return metadata
}

function toCallOptions(options: CallOptions): grpc.CallOptions {
  return options.deadlineMs === undefined ? {} : { deadline: Date.now() + options.deadlineMs }
}

function parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw new CallError('INTERNAL_ERROR', `Malformed response: ${result.error.message}`)
  }
  return result.data
}

/**
 * Yield decoded items from a readable call, mapping failures to CallError
 *
 * Leaving the loop early cancels the call.
 */
async function* readCall<T>(
  call: grpc.ClientReadableStream<unknown> | grpc.ClientDuplexStream<unknown, unknown>,
  decode: (data: unknown) => T
): AsyncGenerator<T, void, undefined> {
  let finished = false
  try {
    for await (const data of call) {
      yield decode(data)
    }
    finished = true
  } catch (err) {
    finished = true
    throw fromServiceError(err)
  } finally {
    if (!finished) call.cancel()
  }
}

/**
 * Create a client for a running server
 *
 * @example
 * ```typescript
 * const client = createClient('127.0.0.1:50051')
 * const payment = await client.processPayment({ accountId: 'acc-1', amount: 10, currency: 'EUR' })
 * ```
 */
export function createClient(address: string, options: ClientOptions = {}): TandemClient {
  const services = new Map(loadServices(options.protoPath ?? PROTO_PATH, PACKAGE_NAME).map((s) => [s.name, s.service]))

  function method(service: string, name: string): grpc.MethodDefinition<unknown, unknown> {
    const definition = services.get(`${PACKAGE_NAME}.${service}`)?.[name]
    if (!definition) {
      throw new Error(`Method ${PACKAGE_NAME}.${service}.${name} not found in proto definition`)
    }
    return definition
  }

  const processPayment = method('Payments', 'ProcessPayment')
  const getTransactionHistory = method('Transactions', 'GetTransactionHistory')
  const chat = method('Chat', 'Chat')

  const client = new grpc.Client(
    address,
    options.credentials ?? grpc.credentials.createInsecure(),
    options.channelOptions
  )

  return {
    processPayment(request, callOptions = {}) {
      return new Promise<PaymentResponse>((resolve, reject) => {
        client.makeUnaryRequest<unknown, unknown>(
          processPayment.path,
          processPayment.requestSerialize,
          processPayment.responseDeserialize,
          request,
          toMetadata(callOptions.metadata),
          toCallOptions(callOptions),
          (err, value) => {
            if (err) {
              reject(fromServiceError(err))
              return
            }
            try {
              resolve(parseResponse(paymentResponseSchema, value))
            } catch (parseError) {
              reject(parseError)
            }
          }
        )
      })
    },

    getTransactionHistory(request, callOptions = {}) {
      return {
        [Symbol.asyncIterator]() {
          const call = client.makeServerStreamRequest<unknown, unknown>(
            getTransactionHistory.path,
            getTransactionHistory.requestSerialize,
            getTransactionHistory.responseDeserialize,
            request,
            toMetadata(callOptions.metadata),
            toCallOptions(callOptions)
          )
          return readCall(call, (data) => parseResponse(transactionRecordSchema, data))
        },
      }
    },

    chat(chatOptions = {}) {
      const metadata = toMetadata(chatOptions.metadata)
      if (chatOptions.user) metadata.set('x-chat-user', chatOptions.user)

      const call = client.makeBidiStreamRequest<unknown, unknown>(
        chat.path,
        chat.requestSerialize,
        chat.responseDeserialize,
        metadata,
        toCallOptions(chatOptions)
      )
      // Errors surface through `messages`; this listener only keeps an unread call from crashing
      call.on('error', (err: Error) => {
        logger.debug({ err }, 'chat call ended with error')
      })

      const messages = readCall(call, (data) => parseResponse(chatMessageSchema, data))

      return {
        messages,

        async send(message) {
          if (!call.write({ user: message.user ?? '', text: message.text })) {
            await once(call, 'drain')
          }
        },

        end() {
          call.end()
        },

        cancel() {
          call.cancel()
        },
      }
    },

    close() {
      client.close()
    },
  }
}
