import { serve } from '@hono/node-server'
import { createApp } from './app'
import { loadEnv } from './lib/env'
import { createLogger } from './lib/log'

const env = loadEnv()
const logger = createLogger(env.LOG_LEVEL)
const app = createApp(env, logger)

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', { port: info.port, env: env.NODE_ENV })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })
  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
