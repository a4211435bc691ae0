import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { ValuationError } from '@forge-validator/valuation-engine'
import type { AppEnv } from './lib/context'
import { failure, SERVICE_NAME, VALIDATOR_VERSION } from './lib/envelope'
import type { Env } from './lib/env'
import { createLogger, type Logger } from './lib/log'
import { requestLogger } from './lib/request-logger'
import { decisionTreeRoutes } from './routes/decision-tree'
import { optionRoutes } from './routes/options'
import { realOptionRoutes } from './routes/real-options'

export function createApp(config: Env, logger: Logger = createLogger(config.LOG_LEVEL)) {
  const app = new Hono<AppEnv>()

  // -------------------------------------------------------------------------
  // Global error handling
  // -------------------------------------------------------------------------

  app.onError((err, c) => {
    const validator = c.get('validator') ?? SERVICE_NAME

    if (err instanceof ValuationError) {
      logger.warn('valuation_rejected', { validator, code: err.code, error: err.message })
      return c.json(failure(validator, err.message, { code: err.code }), 422)
    }

    logger.error('unhandled_error', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: config.NODE_ENV !== 'production' ? err.stack : undefined,
    })
    return c.json(failure(validator, 'Internal server error.'), 500)
  })

  app.notFound((c) => c.json(failure(SERVICE_NAME, 'Not found.'), 404))

  // -------------------------------------------------------------------------
  // Middleware stack (order matters)
  // -------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(logger))

  // 2. Request-scoped logger
  app.use('*', async (c, next) => {
    c.set('logger', logger)
    await next()
  })

  // 3. CORS
  app.use(
    '*',
    cors({
      origin: config.CORS_ORIGINS.includes('*') ? '*' : config.CORS_ORIGINS,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------

  app.get('/health', (c) => c.json({ status: 'ok' }))
  app.get('/', (c) => c.json({ name: SERVICE_NAME, version: VALIDATOR_VERSION }))

  app.route('/decision-tree', decisionTreeRoutes(config))
  app.route('/options', optionRoutes(config))
  app.route('/real-options', realOptionRoutes())

  return app
}
