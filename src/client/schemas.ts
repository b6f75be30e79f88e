/**
 * Response shapes as decoded by the client
 */

import { z } from 'zod'

export const paymentResponseSchema = z.object({
  id: z.string(),
  status: z.literal('approved'),
  accountId: z.string(),
  amount: z.number(),
  currency: z.string(),
  processedAt: z.string(),
})

export const transactionRecordSchema = z.object({
  id: z.string(),
  accountId: z.string(),
  amount: z.number(),
  currency: z.string(),
  kind: z.enum(['debit', 'credit']),
  description: z.string(),
  occurredAt: z.string(),
})

export const chatMessageSchema = z.object({
  sessionId: z.string(),
  user: z.string(),
  text: z.string(),
  sentAt: z.string(),
})
