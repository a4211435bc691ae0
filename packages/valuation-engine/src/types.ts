/**
 * Valuation Engine Domain Types
 *
 * Option specifications and lattice diagnostics for the pricing side,
 * tagged tree nodes and rollback results for the decision side.
 */

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Option payoff direction */
export type OptionType = 'call' | 'put'

/** When the holder may exercise */
export type ExerciseStyle = 'european' | 'american'

/** Market inputs shared by every pricing call */
export interface MarketParams {
  /** Risk-free rate, continuously compounded */
  rate: number
  /** Annualized volatility */
  volatility: number
  /** Time to expiry in years */
  maturity: number
  /** Continuous dividend yield */
  dividendYield: number
}

/** Complete description of one option to price */
export interface OptionSpec extends MarketParams {
  spot: number
  strike: number
  type: OptionType
  exercise: ExerciseStyle
}

/**
 * Analytic sensitivities. Theta is per calendar day; vega and rho are per
 * one percentage point move.
 */
export interface Greeks {
  delta: number
  gamma: number
  theta: number
  vega: number
  rho: number
}

/** Closed-form price with Greeks, or null Greeks at expiry */
export interface ClosedFormResult {
  price: number
  greeks: Greeks | null
  intrinsic: number
  timeValue: number
}

/** Per-step Cox-Ross-Rubinstein factors */
export interface CrrParameters {
  dt: number
  u: number
  d: number
  /** Risk-neutral probability of an up move */
  p: number
  /** Single-step discount e^{-r·dt} */
  discount: number
}

export interface LatticeResult {
  price: number
  steps: number
  /** Null when the option is already at expiry */
  parameters: CrrParameters | null
  intrinsic: number
  timeValue: number
  /**
   * American only: the critical spot at each step (index = step). For puts
   * the highest spot exercised, for calls the lowest. Null where no node
   * exercises early.
   */
  exerciseBoundary?: (number | null)[]
}

export interface ConvergenceRow {
  steps: number
  price: number
  /** Lattice price minus closed-form price */
  difference: number
  withinTolerance: boolean
}

export interface ConvergenceReport {
  closedForm: number
  rows: ConvergenceRow[]
}

// ---------------------------------------------------------------------------
// Decision Trees
// ---------------------------------------------------------------------------

/** Node as received from a caller, before structural checks */
export interface TreeNodeInput {
  name: string
  type?: string
  cost?: number
  probability?: number
  payoff?: number
  children?: TreeNodeInput[]
}

export interface DecisionTreeNode {
  kind: 'decision'
  name: string
  cost: number
  probability?: number
  children: TreeNode[]
}

export interface ChanceTreeNode {
  kind: 'chance'
  name: string
  cost: number
  probability?: number
  children: TreeNode[]
}

export interface TerminalTreeNode {
  kind: 'terminal'
  name: string
  probability?: number
  payoff: number
}

export type TreeNode = DecisionTreeNode | ChanceTreeNode | TerminalTreeNode

export type NodeKind = TreeNode['kind']

/** How a chance node treats children that carry no probability */
export type MissingProbabilityPolicy = 'uniform' | 'reject'

export interface RollbackOptions {
  missingProbabilities?: MissingProbabilityPolicy
  /** Allowed distance of a chance node's probability sum from 1 */
  probabilityTolerance?: number
}

/** A node after rollback, annotated with its expected monetary value */
export interface EvaluatedNode {
  name: string
  kind: NodeKind
  emv: number
  cost?: number
  /** Effective probability, set on every child of a chance node */
  probability?: number
  payoff?: number
  /** Decision nodes only: name of the optimal child */
  chosenChild?: string
  children: EvaluatedNode[]
}

/** Evaluated node in the wire shape: `type` and `decision` keys, no empty children */
export interface TreeReportNode {
  name: string
  type: NodeKind
  emv: number
  cost?: number
  probability?: number
  payoff?: number
  decision?: string
  children?: TreeReportNode[]
}

export interface RiskOutcome {
  name: string
  /** Product of chance probabilities from the alternative down to here */
  probability: number
  payoff: number
}

export interface RiskProfileSummary {
  expectedPayoff: number
  minPayoff: number
  maxPayoff: number
  totalProbability: number
  /** Probability mass on strictly negative payoffs */
  lossProbability: number
}

export interface DecisionTreeAnalysis {
  rootEmv: number
  optimalDecision: string | null
  decisionPath: string[]
  tree: EvaluatedNode
  riskProfiles: Record<string, RiskOutcome[]>
}

// ---------------------------------------------------------------------------
// Real Options
// ---------------------------------------------------------------------------

export interface DelayOptionResult {
  optionValue: number
  npvIfInvestNow: number
  valueOfWaiting: number
  recommendation: 'wait' | 'invest-now'
}

export interface ExpandOptionResult {
  optionValue: number
  additionalCapacityValue: number
  expansionCost: number
}

export interface AbandonOptionResult {
  optionValue: number
  salvageValue: number
  currentProjectValue: number
}
