import type { Context, Next } from 'hono'
import type { Logger } from './log'

/** Per-request variables set by the app's middleware. */
export type AppEnv = {
  Variables: {
    logger: Logger
    /** Name reported in the envelope; unset outside validator routes. */
    validator: string | undefined
  }
}

/** Tag every request on a route group with the validator it reports as. */
export function validatorName(name: string) {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    c.set('validator', name)
    await next()
  }
}
