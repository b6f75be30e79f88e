/**
 * Payload validation
 *
 * Thin zod wrapper: a failed parse becomes an INVALID_REQUEST CallError
 * carrying one issue per offending field.
 */

import type { z } from 'zod'
import { Errors, type FieldIssue } from '../errors/factories.js'

/**
 * Flatten zod issues into field issues
 */
export function toFieldIssues(error: z.ZodError, root = 'request'): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.') || root,
    message: issue.message,
    code: issue.code,
  }))
}

/**
 * Validate `data` against `schema`, returning the parsed output
 *
 * @throws CallError INVALID_REQUEST when validation fails
 *
 * @example
 * ```typescript
 * const request = validate(paymentRequestSchema, input)
 * ```
 */
export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown, root?: string): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw Errors.validation(toFieldIssues(result.error, root))
  }
  return result.data
}
