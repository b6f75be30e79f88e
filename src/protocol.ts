/**
 * Service surface shared by server and client
 */

import { fileURLToPath } from 'node:url'

export const PACKAGE_NAME = 'tandem'

export const PROTO_PATH = fileURLToPath(new URL('../proto/tandem.proto', import.meta.url))

/**
 * Fully-qualified method names
 */
export const Methods = {
  processPayment: 'tandem.Payments.ProcessPayment',
  getTransactionHistory: 'tandem.Transactions.GetTransactionHistory',
  chat: 'tandem.Chat.Chat',
} as const

export type MethodName = (typeof Methods)[keyof typeof Methods]
