import { NumericalDomainError, ValidationError } from './errors'
import type { OptionSpec } from './types'

/**
 * Reject option inputs that would make either pricer divide by zero or take
 * the log of a non-positive number. Volatility only matters before expiry.
 */
export function assertOptionSpec(spec: OptionSpec): void {
  const fields: [string, number][] = [
    ['spot', spec.spot],
    ['strike', spec.strike],
    ['rate', spec.rate],
    ['volatility', spec.volatility],
    ['maturity', spec.maturity],
    ['dividendYield', spec.dividendYield],
  ]
  for (const [field, value] of fields) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number, got ${value}`)
    }
  }

  if (spec.spot <= 0) throw new NumericalDomainError(`spot must be positive, got ${spec.spot}`)
  if (spec.strike <= 0) throw new NumericalDomainError(`strike must be positive, got ${spec.strike}`)
  if (spec.maturity > 0 && spec.volatility <= 0) {
    throw new NumericalDomainError(
      `volatility must be positive before expiry, got ${spec.volatility}`,
    )
  }
}
