/**
 * Agreement checks between a computed value and its reference. Comparisons
 * are relative unless the reference is zero, where a relative measure is
 * meaningless and the absolute magnitude is used instead.
 */

/** |actual − expected| / |expected|, or |actual| when expected is 0 */
export function relativeDifference(actual: number, expected: number): number {
  if (Math.abs(expected) < Number.EPSILON) return Math.abs(actual)
  return Math.abs(actual - expected) / Math.abs(expected)
}

export function withinTolerance(actual: number, expected: number, tolerance: number): boolean {
  return relativeDifference(actual, expected) <= tolerance
}
