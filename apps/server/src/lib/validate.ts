import type { Context } from 'hono'
import type { z } from 'zod'
import { failure } from './envelope'

/**
 * Parse and validate a request body with a Zod schema. Returns a 400
 * failure envelope for malformed JSON or schema violations.
 */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
  validator: string,
): Promise<z.output<T> | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json(failure(validator, 'Invalid JSON body.'), 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten()
    const messages = [...formErrors, ...Object.values(fieldErrors).flatMap((m) => m ?? [])]
    const error = messages.length > 0 ? `Validation failed: ${messages.join('; ')}` : 'Validation failed.'
    return c.json(failure(validator, error, { code: 'validation', fields: fieldErrors }), 400)
  }

  return result.data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
