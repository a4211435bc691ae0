/**
 * Response envelope shared by every validator route.
 *
 * Consumers branch on `success`; on failure `results` is null and `error`
 * carries the message.
 */

export const SERVICE_NAME = 'forge-validator'
export const VALIDATOR_VERSION = '1.0.0'

export interface Envelope<T> {
  validator: string
  version: string
  success: boolean
  results: T | null
  error?: string
  code?: string
  fields?: Record<string, string[] | undefined>
}

export function success<T>(validator: string, results: T): Envelope<T> {
  return { validator, version: VALIDATOR_VERSION, success: true, results }
}

export function failure(
  validator: string,
  error: string,
  extra: Pick<Envelope<never>, 'code' | 'fields'> = {},
): Envelope<never> {
  return { validator, version: VALIDATOR_VERSION, success: false, results: null, error, ...extra }
}
