import { Hono } from 'hono'
import { realOptionRequestSchema } from '@forge-validator/shared'
import type { RealOptionRequest } from '@forge-validator/shared'
import { optionToAbandon, optionToDelay, optionToExpand } from '@forge-validator/valuation-engine'
import type { MarketParams } from '@forge-validator/valuation-engine'
import { validatorName, type AppEnv } from '../lib/context'
import { success } from '../lib/envelope'
import { parseBody, isResponse } from '../lib/validate'

const VALIDATOR = 'real-options'

function value(body: RealOptionRequest) {
  const market: MarketParams = { rate: body.r, volatility: body.sigma, maturity: body.T, dividendYield: body.q }
  switch (body.kind) {
    case 'delay':
      return { kind: body.kind, ...optionToDelay(body.V, body.I, market) }
    case 'expand':
      return { kind: body.kind, ...optionToExpand(body.V, body.expansionCost, body.expansionFactor, market) }
    case 'abandon':
      return { kind: body.kind, ...optionToAbandon(body.V, body.salvageValue, market) }
  }
}

export function realOptionRoutes() {
  const routes = new Hono<AppEnv>()
  routes.use('*', validatorName(VALIDATOR))

  // POST /real-options — delay, expand or abandon valued as European options
  routes.post('/', async (c) => {
    const body = await parseBody(c, realOptionRequestSchema, VALIDATOR)
    if (isResponse(body)) return body
    return c.json(success(VALIDATOR, value(body)))
  })

  return routes
}
