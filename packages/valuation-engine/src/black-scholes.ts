/**
 * Closed-form Black-Scholes-Merton pricing for European options on an asset
 * paying a continuous dividend yield q.
 *
 *   d₁ = [ln(S/K) + (r − q + σ²/2)T] / (σ√T)
 *   d₂ = d₁ − σ√T
 *   C  = S·e^{-qT}·N(d₁) − K·e^{-rT}·N(d₂)
 *   P  = K·e^{-rT}·N(−d₂) − S·e^{-qT}·N(−d₁)
 *
 * At or past expiry (T ≤ 0) the price collapses to intrinsic value and the
 * Greeks are not defined, so they are reported as null.
 *
 * References:
 * - Black & Scholes (1973). "The Pricing of Options and Corporate Liabilities"
 * - Merton (1973). "Theory of Rational Option Pricing"
 */

import { ValidationError } from './errors'
import { assertOptionSpec } from './inputs'
import { discountFactor, intrinsicValue, normCDF, normPDF } from './payoff'
import type { ClosedFormResult, Greeks, OptionSpec } from './types'

const DAYS_PER_YEAR = 365

interface DTerms {
  d1: number
  d2: number
  sqrtT: number
}

function dTerms(spec: OptionSpec): DTerms {
  const { spot, strike, rate, volatility, maturity, dividendYield } = spec
  const sqrtT = Math.sqrt(maturity)
  const d1 =
    (Math.log(spot / strike) + (rate - dividendYield + 0.5 * volatility * volatility) * maturity) /
    (volatility * sqrtT)
  return { d1, d2: d1 - volatility * sqrtT, sqrtT }
}

function assertEuropean(spec: OptionSpec): void {
  assertOptionSpec(spec)
  if (spec.exercise === 'american') {
    throw new ValidationError('Closed-form pricing covers European exercise only; use the binomial model')
  }
}

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

/** European option price; intrinsic value when T ≤ 0. */
export function blackScholesPrice(spec: OptionSpec): number {
  assertEuropean(spec)
  const { spot, strike, rate, maturity, dividendYield, type } = spec
  if (maturity <= 0) return intrinsicValue(type, spot, strike)

  const { d1, d2 } = dTerms(spec)
  const assetDiscount = discountFactor(dividendYield, maturity)
  const strikeDiscount = discountFactor(rate, maturity)

  return type === 'call'
    ? spot * assetDiscount * normCDF(d1) - strike * strikeDiscount * normCDF(d2)
    : strike * strikeDiscount * normCDF(-d2) - spot * assetDiscount * normCDF(-d1)
}

/**
 * Analytic Greeks. Theta is divided by 365 to give a per-day figure; vega and
 * rho are divided by 100 to give the change per one percentage point.
 *
 * Returns null at or past expiry.
 */
export function blackScholesGreeks(spec: OptionSpec): Greeks | null {
  assertEuropean(spec)
  const { spot, strike, rate, volatility, maturity, dividendYield, type } = spec
  if (maturity <= 0) return null

  const { d1, d2, sqrtT } = dTerms(spec)
  const assetDiscount = discountFactor(dividendYield, maturity)
  const strikeDiscount = discountFactor(rate, maturity)
  const density = normPDF(d1)

  const gamma = (assetDiscount * density) / (spot * volatility * sqrtT)
  const vega = spot * assetDiscount * sqrtT * density
  // Time decay of the diffusion term, common to both sides
  const decay = -(spot * volatility * assetDiscount * density) / (2 * sqrtT)

  if (type === 'call') {
    const theta =
      decay -
      rate * strike * strikeDiscount * normCDF(d2) +
      dividendYield * spot * assetDiscount * normCDF(d1)
    return {
      delta: assetDiscount * normCDF(d1),
      gamma,
      theta: theta / DAYS_PER_YEAR,
      vega: vega / 100,
      rho: (strike * maturity * strikeDiscount * normCDF(d2)) / 100,
    }
  }

  const theta =
    decay +
    rate * strike * strikeDiscount * normCDF(-d2) -
    dividendYield * spot * assetDiscount * normCDF(-d1)
  return {
    delta: assetDiscount * (normCDF(d1) - 1),
    gamma,
    theta: theta / DAYS_PER_YEAR,
    vega: vega / 100,
    rho: (-strike * maturity * strikeDiscount * normCDF(-d2)) / 100,
  }
}

/** Price, Greeks, and the intrinsic/time-value split in one call. */
export function blackScholes(spec: OptionSpec): ClosedFormResult {
  const price = blackScholesPrice(spec)
  const intrinsic = intrinsicValue(spec.type, spec.spot, spec.strike)
  return {
    price,
    greeks: blackScholesGreeks(spec),
    intrinsic,
    timeValue: price - intrinsic,
  }
}

/**
 * Deviation from put-call parity: C − P − (S·e^{-qT} − K·e^{-rT}).
 * Zero up to rounding for any consistent pair of closed-form prices.
 */
export function putCallParityGap(spec: OptionSpec): number {
  const call = blackScholesPrice({ ...spec, type: 'call' })
  const put = blackScholesPrice({ ...spec, type: 'put' })
  const forward =
    spec.spot * discountFactor(spec.dividendYield, spec.maturity) -
    spec.strike * discountFactor(spec.rate, spec.maturity)
  return call - put - forward
}
