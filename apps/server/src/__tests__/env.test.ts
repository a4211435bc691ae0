import { describe, it, expect } from 'vitest'
import { loadEnv } from '../lib/env'

describe('loadEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadEnv({})).toEqual({
      PORT: 4000,
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      CORS_ORIGINS: ['*'],
      PROBABILITY_TOLERANCE: 1e-6,
      MISSING_PROBABILITIES: 'uniform',
      MAX_LATTICE_STEPS: 10_000,
    })
  })

  it('reads and normalizes provided values', () => {
    const env = loadEnv({
      PORT: '8080',
      LOG_LEVEL: 'WARN',
      CORS_ORIGINS: 'http://a.test,http://b.test',
      PROBABILITY_TOLERANCE: '0.001',
      MISSING_PROBABILITIES: 'Reject',
      MAX_LATTICE_STEPS: '2000',
    })
    expect(env.PORT).toBe(8080)
    expect(env.LOG_LEVEL).toBe('warn')
    expect(env.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test'])
    expect(env.PROBABILITY_TOLERANCE).toBe(0.001)
    expect(env.MISSING_PROBABILITIES).toBe('reject')
    expect(env.MAX_LATTICE_STEPS).toBe(2000)
  })

  it('treats empty strings as unset', () => {
    expect(loadEnv({ PORT: '' }).PORT).toBe(4000)
  })

  it('fails fast on malformed numbers', () => {
    expect(() => loadEnv({ PORT: 'eighty' })).toThrow(
      'Invalid environment variable PORT: expected a positive number, got "eighty".',
    )
    expect(() => loadEnv({ PROBABILITY_TOLERANCE: '-1' })).toThrow(/PROBABILITY_TOLERANCE/)
    expect(() => loadEnv({ MAX_LATTICE_STEPS: '12.5' })).toThrow(
      'Invalid environment variable MAX_LATTICE_STEPS: expected an integer, got 12.5.',
    )
  })

  it('fails fast on values outside an enumeration', () => {
    expect(() => loadEnv({ MISSING_PROBABILITIES: 'ignore' })).toThrow(
      'Invalid environment variable MISSING_PROBABILITIES: expected one of uniform, reject, got "ignore".',
    )
    expect(() => loadEnv({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/)
  })
})
