/**
 * Real options on a project, priced as European options with the project's
 * present value as the underlying:
 *
 * - Delay:   call on V struck at the investment cost I
 * - Expand:  call on the extra value V·(factor − 1) struck at the expansion cost
 * - Abandon: put on V struck at the salvage value
 */

import { blackScholesPrice } from './black-scholes'
import { ValidationError } from './errors'
import type {
  AbandonOptionResult,
  DelayOptionResult,
  ExpandOptionResult,
  MarketParams,
  OptionSpec,
} from './types'

function european(spot: number, strike: number, type: OptionSpec['type'], market: MarketParams): OptionSpec {
  return { ...market, spot, strike, type, exercise: 'european' }
}

/**
 * Option to delay an investment. Waiting is worth it when the option value
 * exceeds the NPV of investing today (floored at zero).
 */
export function optionToDelay(
  projectValue: number,
  investmentCost: number,
  market: MarketParams,
): DelayOptionResult {
  const optionValue = blackScholesPrice(european(projectValue, investmentCost, 'call', market))
  const npvIfInvestNow = projectValue - investmentCost
  const valueOfWaiting = optionValue - Math.max(npvIfInvestNow, 0)

  return {
    optionValue,
    npvIfInvestNow,
    valueOfWaiting,
    recommendation: optionValue > Math.max(npvIfInvestNow, 0) ? 'wait' : 'invest-now',
  }
}

export function optionToExpand(
  projectValue: number,
  expansionCost: number,
  expansionFactor: number,
  market: MarketParams,
): ExpandOptionResult {
  if (!(expansionFactor > 1)) {
    throw new ValidationError(`expansionFactor must exceed 1, got ${expansionFactor}`)
  }
  const additionalCapacityValue = projectValue * (expansionFactor - 1)
  const optionValue = blackScholesPrice(
    european(additionalCapacityValue, expansionCost, 'call', market),
  )
  return { optionValue, additionalCapacityValue, expansionCost }
}

export function optionToAbandon(
  projectValue: number,
  salvageValue: number,
  market: MarketParams,
): AbandonOptionResult {
  const optionValue = blackScholesPrice(european(projectValue, salvageValue, 'put', market))
  return { optionValue, salvageValue, currentProjectValue: projectValue }
}
