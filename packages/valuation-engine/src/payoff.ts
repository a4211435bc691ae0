/**
 * Payoff and discounting utilities shared by the closed-form pricer and
 * the binomial lattice.
 */

import type { OptionType } from './types'

// ---------------------------------------------------------------------------
// Normal Distribution Functions
// ---------------------------------------------------------------------------

/**
 * Standard normal CDF using Abramowitz & Stegun 7.1.26.
 * Maximum absolute error < 1.5e-7, which bounds the closed-form prices to
 * about four decimals; the e^{-qT}-weighted N(d₁) terms inherit it.
 */
export function normCDF(x: number): number {
  const a1 = 0.254829592
  const a2 = -0.284496736
  const a3 = 1.421413741
  const a4 = -1.453152027
  const a5 = 1.061405429
  const p = 0.3275911

  const sign = x < 0 ? -1 : 1
  const absX = Math.abs(x) / Math.SQRT2
  const t = 1.0 / (1.0 + p * absX)
  const y = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-absX * absX)
  return 0.5 * (1.0 + sign * y)
}

/** Standard normal PDF */
export function normPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI)
}

// ---------------------------------------------------------------------------
// Payoffs
// ---------------------------------------------------------------------------

/** Immediate exercise value: max(S−K, 0) for a call, max(K−S, 0) for a put */
export function intrinsicValue(type: OptionType, spot: number, strike: number): number {
  return type === 'call' ? Math.max(spot - strike, 0) : Math.max(strike - spot, 0)
}

/** Continuous discount factor e^{-rt} */
export function discountFactor(rate: number, t: number): number {
  return Math.exp(-rate * t)
}
