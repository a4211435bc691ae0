export type ValuationErrorCode =
  | 'validation'
  | 'tree-structure'
  | 'probability'
  | 'numerical-domain'

/** Base class for every failure the engine reports to its caller. */
export class ValuationError extends Error {
  constructor(
    public readonly code: ValuationErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'ValuationError'
  }
}

/** Missing or malformed input parameters. */
export class ValidationError extends ValuationError {
  constructor(message: string) {
    super('validation', message)
    this.name = 'ValidationError'
  }
}

/** Tree shape violates the node-kind invariants. */
export class TreeStructureError extends ValuationError {
  constructor(
    public readonly nodeName: string,
    message: string,
  ) {
    super('tree-structure', `Node "${nodeName}": ${message}`)
    this.name = 'TreeStructureError'
  }
}

/** Chance node probabilities are missing, out of range, or do not sum to 1. */
export class ProbabilityError extends ValuationError {
  constructor(
    public readonly nodeName: string,
    message: string,
  ) {
    super('probability', `Chance node "${nodeName}": ${message}`)
    this.name = 'ProbabilityError'
  }
}

/** Inputs would produce NaN/Infinity or an invalid risk-neutral measure. */
export class NumericalDomainError extends ValuationError {
  constructor(message: string) {
    super('numerical-domain', message)
    this.name = 'NumericalDomainError'
  }
}
