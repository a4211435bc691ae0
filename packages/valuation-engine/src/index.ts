/**
 * @forge-validator/valuation-engine
 *
 * Reference valuations used to check an external engine's results.
 *
 * Sub-domains:
 * - Payoff & discounting utilities
 * - Closed-form Black-Scholes-Merton pricing with analytic Greeks
 * - CRR binomial lattice (European/American, early-exercise boundary)
 * - Decision-tree rollback, optimal path and risk profiles
 * - Real options (delay, expand, abandon)
 * - Agreement checks
 */

// Types
export type {
  OptionType,
  ExerciseStyle,
  MarketParams,
  OptionSpec,
  Greeks,
  ClosedFormResult,
  CrrParameters,
  LatticeResult,
  ConvergenceRow,
  ConvergenceReport,
  TreeNodeInput,
  DecisionTreeNode,
  ChanceTreeNode,
  TerminalTreeNode,
  TreeNode,
  NodeKind,
  MissingProbabilityPolicy,
  RollbackOptions,
  EvaluatedNode,
  TreeReportNode,
  RiskOutcome,
  RiskProfileSummary,
  DecisionTreeAnalysis,
  DelayOptionResult,
  ExpandOptionResult,
  AbandonOptionResult,
} from './types'

// Errors
export {
  ValuationError,
  ValidationError,
  TreeStructureError,
  ProbabilityError,
  NumericalDomainError,
} from './errors'
export type { ValuationErrorCode } from './errors'

// Payoff & discounting
export { normCDF, normPDF, intrinsicValue, discountFactor } from './payoff'

// Closed form
export { blackScholes, blackScholesPrice, blackScholesGreeks, putCallParityGap } from './black-scholes'

// Lattice
export { crrParameters, binomialPrice, convergenceTable } from './binomial'
export type { ConvergenceOptions } from './binomial'

// Decision trees
export {
  buildDecisionTree,
  rollback,
  resolveProbabilities,
  optimalPath,
  toTreeReport,
  analyzeDecisionTree,
  DEFAULT_PROBABILITY_TOLERANCE,
} from './decision-tree'
export { riskProfile, summarizeRiskProfile } from './risk-profile'

// Real options
export { optionToDelay, optionToExpand, optionToAbandon } from './real-options'

// Agreement checks
export { relativeDifference, withinTolerance } from './tolerance'
