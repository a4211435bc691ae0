import { Hono } from 'hono'
import { convergenceRequestSchema, optionPricingRequestSchema } from '@forge-validator/shared'
import type { ConvergenceRequest, OptionPricingRequest } from '@forge-validator/shared'
import {
  binomialPrice,
  blackScholes,
  convergenceTable,
  ValidationError,
} from '@forge-validator/valuation-engine'
import type { OptionSpec } from '@forge-validator/valuation-engine'
import { validatorName, type AppEnv } from '../lib/context'
import { success } from '../lib/envelope'
import type { Env } from '../lib/env'
import { parseBody, isResponse } from '../lib/validate'

// ---------------------------------------------------------------------------
// Request mapping
// ---------------------------------------------------------------------------

type ContractFields = Pick<OptionPricingRequest, 'optionType' | 'S' | 'K' | 'r' | 'sigma' | 'T' | 'q'>

function toOptionSpec(body: ContractFields, american: boolean): OptionSpec {
  return {
    spot: body.S,
    strike: body.K,
    rate: body.r,
    volatility: body.sigma,
    maturity: body.T,
    dividendYield: body.q,
    type: body.optionType,
    exercise: american ? 'american' : 'european',
  }
}

function echoInputs(body: ContractFields) {
  return { S: body.S, K: body.K, r: body.r, sigma: body.sigma, T: body.T, q: body.q }
}

function assertStepLimit(steps: readonly number[], max: number): void {
  const over = steps.find((n) => n > max)
  if (over !== undefined) {
    throw new ValidationError(`Lattice step count ${over} exceeds the limit of ${max}`)
  }
}

function price(body: OptionPricingRequest) {
  const spec = toOptionSpec(body, body.american)

  if (body.model === 'binomial') {
    const result = binomialPrice(spec, body.n)
    return {
      price: result.price,
      model: body.model,
      optionType: body.optionType,
      steps: result.steps,
      american: body.american,
      u: result.parameters?.u ?? null,
      d: result.parameters?.d ?? null,
      p: result.parameters?.p ?? null,
      exerciseBoundary: result.exerciseBoundary,
      intrinsic: result.intrinsic,
      timeValue: result.timeValue,
      inputs: echoInputs(body),
    }
  }

  const result = blackScholes(spec)
  return {
    price: result.price,
    model: body.model,
    optionType: body.optionType,
    greeks: result.greeks,
    intrinsic: result.intrinsic,
    timeValue: result.timeValue,
    inputs: echoInputs(body),
  }
}

function converge(body: ConvergenceRequest) {
  return convergenceTable(toOptionSpec(body, false), body.steps, {
    tolerance: body.tolerance,
    relative: body.relative,
  })
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function optionRoutes(config: Pick<Env, 'MAX_LATTICE_STEPS'>) {
  const routes = new Hono<AppEnv>()

  // POST /options/price — closed form with Greeks, or the CRR lattice
  routes.post('/price', validatorName('option-pricing'), async (c) => {
    const body = await parseBody(c, optionPricingRequestSchema, 'option-pricing')
    if (isResponse(body)) return body
    if (body.model === 'binomial') assertStepLimit([body.n], config.MAX_LATTICE_STEPS)
    return c.json(success('option-pricing', price(body)))
  })

  // POST /options/convergence — lattice prices against the closed form
  routes.post('/convergence', validatorName('option-convergence'), async (c) => {
    const body = await parseBody(c, convergenceRequestSchema, 'option-convergence')
    if (isResponse(body)) return body
    assertStepLimit(body.steps, config.MAX_LATTICE_STEPS)
    return c.json(success('option-convergence', converge(body)))
  })

  return routes
}
