/**
 * Cox-Ross-Rubinstein binomial lattice for European and American options.
 *
 * Per step: u = e^{σ√dt}, d = 1/u, p = (e^{(r−q)dt} − d) / (u − d).
 * The lattice is never materialized; a single rolling array holds the option
 * values of one time layer and collapses into the layer before it. Node spots
 * are computed in log space, S·e^{(2j−k)σ√dt}, since u·d = 1.
 *
 * As the step count grows the European price converges to the
 * Black-Scholes value, which is the main cross-check between the two.
 *
 * References:
 * - Cox, Ross & Rubinstein (1979). "Option Pricing: A Simplified Approach"
 */

import { blackScholesPrice } from './black-scholes'
import { NumericalDomainError, ValidationError } from './errors'
import { assertOptionSpec } from './inputs'
import { intrinsicValue } from './payoff'
import { withinTolerance } from './tolerance'
import type { ConvergenceReport, CrrParameters, LatticeResult, OptionSpec } from './types'

function assertSteps(steps: number): void {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new ValidationError(`steps must be a positive integer, got ${steps}`)
  }
}

/**
 * Per-step CRR factors. Fails instead of clamping when p falls outside
 * [0, 1], which happens when the drift per step exceeds the up/down spread.
 */
export function crrParameters(spec: OptionSpec, steps: number): CrrParameters {
  assertSteps(steps)
  const { rate, volatility, maturity, dividendYield } = spec
  if (!(volatility > 0)) {
    throw new NumericalDomainError(`volatility must be positive, got ${volatility}`)
  }
  if (!(maturity > 0)) {
    throw new NumericalDomainError(`maturity must be positive to build a lattice, got ${maturity}`)
  }

  const dt = maturity / steps
  const u = Math.exp(volatility * Math.sqrt(dt))
  const d = 1 / u
  if (!Number.isFinite(u) || d === 0) {
    throw new NumericalDomainError(
      `up factor e^{σ√dt} overflows (σ=${volatility}, dt=${dt}); reduce volatility or increase steps`,
    )
  }
  const p = (Math.exp((rate - dividendYield) * dt) - d) / (u - d)

  if (!(p >= 0 && p <= 1)) {
    throw new NumericalDomainError(
      `risk-neutral probability ${p} is outside [0, 1] (dt=${dt}, u=${u}, d=${d}); ` +
        `increase steps or volatility`,
    )
  }

  return { dt, u, d, p, discount: Math.exp(-rate * dt) }
}

/**
 * Price an option on the CRR lattice.
 *
 * American exercise compares continuation against intrinsic value at every
 * node of every step, and records the early-exercise boundary.
 */
export function binomialPrice(spec: OptionSpec, steps: number): LatticeResult {
  assertOptionSpec(spec)
  assertSteps(steps)

  const { spot, strike, type } = spec
  const intrinsic = intrinsicValue(type, spot, strike)
  if (spec.maturity <= 0) {
    return { price: intrinsic, steps, parameters: null, intrinsic, timeValue: 0 }
  }

  const parameters = crrParameters(spec, steps)
  const { p, discount } = parameters
  const american = spec.exercise === 'american'
  const n = steps
  const logU = spec.volatility * Math.sqrt(parameters.dt)
  const nodeSpot = (step: number, j: number) => spot * Math.exp((2 * j - step) * logU)

  // Terminal payoffs, index j = number of up moves
  const values = new Float64Array(n + 1)
  for (let j = 0; j <= n; j++) {
    values[j] = intrinsicValue(type, nodeSpot(n, j), strike)
  }

  const boundary: (number | null)[] = american ? new Array<number | null>(n + 1).fill(null) : []
  if (american) boundary[n] = strike

  for (let step = n - 1; step >= 0; step--) {
    let critical: number | null = null

    for (let j = 0; j <= step; j++) {
      const hold = discount * (p * values[j + 1] + (1 - p) * values[j])
      if (!american) {
        values[j] = hold
        continue
      }

      const price = nodeSpot(step, j)
      const exercise = intrinsicValue(type, price, strike)
      if (exercise > hold) {
        values[j] = exercise
        if (critical === null) critical = price
        else critical = type === 'call' ? Math.min(critical, price) : Math.max(critical, price)
      } else {
        values[j] = hold
      }
    }

    if (american) boundary[step] = critical
  }

  const price = values[0]
  if (!Number.isFinite(price)) {
    throw new NumericalDomainError(
      `lattice price is not finite (${price}) after ${steps} steps; volatility is too large for this lattice`,
    )
  }
  const result: LatticeResult = {
    price,
    steps,
    parameters,
    intrinsic,
    timeValue: price - intrinsic,
  }
  if (american) result.exerciseBoundary = boundary
  return result
}

export interface ConvergenceOptions {
  tolerance: number
  /** Compare relative to the closed-form price instead of absolutely */
  relative?: boolean
}

/**
 * European lattice prices at several step counts against the closed form.
 */
export function convergenceTable(
  spec: OptionSpec,
  stepCounts: number[],
  options: ConvergenceOptions,
): ConvergenceReport {
  const european: OptionSpec = { ...spec, exercise: 'european' }
  const closedForm = blackScholesPrice(european)

  const rows = stepCounts.map((steps) => {
    const { price } = binomialPrice(european, steps)
    const difference = price - closedForm
    return {
      steps,
      price,
      difference,
      withinTolerance: options.relative
        ? withinTolerance(price, closedForm, options.tolerance)
        : Math.abs(difference) <= options.tolerance,
    }
  })

  return { closedForm, rows }
}
