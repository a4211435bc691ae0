/**
 * Structured request logging middleware.
 *
 * Emits one `request` line per request with the HTTP method, path, response
 * status and duration in ms. Server errors are logged at error level.
 */

import type { Context, Next } from 'hono'
import type { Logger } from './log'

export function requestLogger(logger: Logger) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = Number((performance.now() - start).toFixed(1))

    const fields = { method: c.req.method, path: c.req.path, status: c.res.status, ms }
    if (c.res.status >= 500) logger.error('request', fields)
    else logger.info('request', fields)
  }
}
