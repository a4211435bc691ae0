/**
 * Environment variable validation — fail-fast on startup.
 *
 * Call `loadEnv` once in the server entry point. A malformed value throws
 * immediately instead of surfacing later as a wrong valuation.
 */

type Source = Record<string, string | undefined>

function optional(source: Source, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val === '' ? fallback : val
}

function positiveNumber(source: Source, key: string, fallback: number): number {
  const raw = optional(source, key, String(fallback))
  const val = Number(raw)
  if (!Number.isFinite(val) || val <= 0) {
    throw new Error(`Invalid environment variable ${key}: expected a positive number, got "${raw}".`)
  }
  return val
}

function positiveInteger(source: Source, key: string, fallback: number): number {
  const val = positiveNumber(source, key, fallback)
  if (!Number.isInteger(val)) {
    throw new Error(`Invalid environment variable ${key}: expected an integer, got ${val}.`)
  }
  return val
}

function oneOf<T extends string>(source: Source, key: string, allowed: readonly T[], fallback: T): T {
  const raw = optional(source, key, fallback).toLowerCase()
  const match = allowed.find((candidate) => candidate === raw)
  if (match === undefined) {
    throw new Error(
      `Invalid environment variable ${key}: expected one of ${allowed.join(', ')}, got "${raw}".`,
    )
  }
  return match
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

export function loadEnv(source: Source = process.env) {
  return {
    PORT: positiveInteger(source, 'PORT', 4000),
    NODE_ENV: optional(source, 'NODE_ENV', 'development'),
    LOG_LEVEL: oneOf(source, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    CORS_ORIGINS: optional(source, 'CORS_ORIGINS', '*').split(','),
    PROBABILITY_TOLERANCE: positiveNumber(source, 'PROBABILITY_TOLERANCE', 1e-6),
    MISSING_PROBABILITIES: oneOf(source, 'MISSING_PROBABILITIES', ['uniform', 'reject'] as const, 'uniform'),
    MAX_LATTICE_STEPS: positiveInteger(source, 'MAX_LATTICE_STEPS', 10_000),
  } as const
}

export type Env = ReturnType<typeof loadEnv>
