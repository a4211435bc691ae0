/**
 * Decision tree evaluation by backward induction (rollback).
 *
 * Values flow from the leaves to the root:
 * - Terminal: EMV = payoff
 * - Chance:   EMV = Σ pᵢ·EMVᵢ − cost
 * - Decision: EMV = max EMVᵢ − cost, remembering which child attains it
 *
 * Raw input is first checked and converted into tagged nodes, so rollback
 * itself never has to guess what a node is.
 */

import { ProbabilityError, TreeStructureError, ValidationError } from './errors'
import { riskProfile } from './risk-profile'
import { postOrder } from './traversal'
import type {
  ChanceTreeNode,
  DecisionTreeAnalysis,
  EvaluatedNode,
  NodeKind,
  RiskOutcome,
  RollbackOptions,
  TreeNode,
  TreeNodeInput,
  TreeReportNode,
} from './types'

export const DEFAULT_PROBABILITY_TOLERANCE = 1e-6

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Missing types default to decision at the root, terminal for childless
 * nodes and decision for any other node with children. Unrecognized type
 * strings get decision semantics.
 */
function resolveKind(raw: TreeNodeInput, isRoot: boolean): NodeKind {
  const declared = raw.type?.toLowerCase()
  if (declared === 'decision' || declared === 'chance' || declared === 'terminal') return declared
  if (declared !== undefined || isRoot) return 'decision'
  return raw.children && raw.children.length > 0 ? 'decision' : 'terminal'
}

function assertFiniteField(name: string, field: string, value: number | undefined): void {
  if (value !== undefined && !Number.isFinite(value)) {
    throw new TreeStructureError(name, `${field} must be a finite number, got ${value}`)
  }
}

function lookup<K, V>(map: Map<K, V>, key: K, name: string): V {
  const value = map.get(key)
  if (value === undefined) throw new TreeStructureError(name, 'child was not processed before its parent')
  return value
}

function buildNode(raw: TreeNodeInput, isRoot: boolean, built: Map<TreeNodeInput, TreeNode>): TreeNode {
  const { name } = raw
  if (typeof name !== 'string' || name.trim() === '') {
    throw new TreeStructureError(String(name), 'every node needs a non-empty name')
  }
  assertFiniteField(name, 'cost', raw.cost)
  assertFiniteField(name, 'probability', raw.probability)
  assertFiniteField(name, 'payoff', raw.payoff)

  const kind = resolveKind(raw, isRoot)
  const rawChildren = raw.children ?? []

  if (kind === 'terminal') {
    if (rawChildren.length > 0) {
      throw new TreeStructureError(name, 'terminal nodes cannot have children')
    }
    if (raw.payoff === undefined) {
      throw new TreeStructureError(name, 'terminal nodes require a payoff')
    }
    return { kind, name, probability: raw.probability, payoff: raw.payoff }
  }

  if (rawChildren.length === 0) {
    throw new TreeStructureError(name, `${kind} nodes need at least one child`)
  }

  const children = rawChildren.map((child) => lookup(built, child, name))
  const names = new Set<string>()
  for (const child of children) {
    if (names.has(child.name)) {
      throw new TreeStructureError(name, `duplicate child name "${child.name}"`)
    }
    names.add(child.name)
  }

  return { kind, name, cost: raw.cost ?? 0, probability: raw.probability, children }
}

/** Check raw input and convert it into tagged nodes. */
export function buildDecisionTree(input: TreeNodeInput | undefined): TreeNode {
  if (input === undefined) {
    throw new ValidationError("Decision tree requires a 'tree' specification")
  }

  const built = new Map<TreeNodeInput, TreeNode>()
  for (const raw of postOrder(input, (n) => n.children ?? [], (n) => n.name)) {
    built.set(raw, buildNode(raw, raw === input, built))
  }
  return lookup(built, input, input.name)
}

// ---------------------------------------------------------------------------
// Rollback
// ---------------------------------------------------------------------------

function childrenOf(node: TreeNode): readonly TreeNode[] {
  return node.kind === 'terminal' ? [] : node.children
}

/**
 * Effective probabilities of a chance node's children. Under the uniform
 * policy a missing probability becomes 1/childCount; the resolved set must
 * still sum to 1 within tolerance.
 */
export function resolveProbabilities(
  node: ChanceTreeNode,
  options: RollbackOptions = {},
): number[] {
  const policy = options.missingProbabilities ?? 'uniform'
  const tolerance = options.probabilityTolerance ?? DEFAULT_PROBABILITY_TOLERANCE
  const count = node.children.length

  const probabilities = node.children.map((child) => {
    if (child.probability === undefined) {
      if (policy === 'reject') {
        throw new ProbabilityError(node.name, `child "${child.name}" has no probability`)
      }
      return 1 / count
    }
    if (!(child.probability >= 0 && child.probability <= 1)) {
      throw new ProbabilityError(
        node.name,
        `child "${child.name}" has probability ${child.probability} outside [0, 1]`,
      )
    }
    return child.probability
  })

  const sum = probabilities.reduce((acc, p) => acc + p, 0)
  if (Math.abs(sum - 1) > tolerance) {
    throw new ProbabilityError(node.name, `child probabilities sum to ${sum}, expected 1`)
  }
  return probabilities
}

function evaluateNode(
  node: TreeNode,
  evaluated: Map<TreeNode, EvaluatedNode>,
  options: RollbackOptions,
): EvaluatedNode {
  if (node.kind === 'terminal') {
    return {
      name: node.name,
      kind: node.kind,
      emv: node.payoff,
      probability: node.probability,
      payoff: node.payoff,
      children: [],
    }
  }

  if (node.children.length === 0) {
    throw new TreeStructureError(node.name, `${node.kind} nodes need at least one child`)
  }
  const children = node.children.map((child) => lookup(evaluated, child, node.name))
  const base = {
    name: node.name,
    kind: node.kind,
    cost: node.cost,
    probability: node.probability,
    children,
  }

  if (node.kind === 'chance') {
    const probabilities = resolveProbabilities(node, options)
    let expected = 0
    children.forEach((child, i) => {
      child.probability = probabilities[i]
      expected += child.emv * probabilities[i]
    })
    return { ...base, emv: expected - node.cost }
  }

  // Strictly greater, so the first of several equal children wins
  let best = children[0]
  for (const child of children) {
    if (child.emv > best.emv) best = child
  }
  return { ...base, emv: best.emv - node.cost, chosenChild: best.name }
}

/**
 * Roll the tree back from the leaves. The input is left untouched; the
 * result is a fresh annotated tree.
 */
export function rollback(tree: TreeNode, options: RollbackOptions = {}): EvaluatedNode {
  const evaluated = new Map<TreeNode, EvaluatedNode>()
  for (const node of postOrder(tree, childrenOf, (n) => n.name)) {
    evaluated.set(node, evaluateNode(node, evaluated, options))
  }
  return lookup(evaluated, tree, tree.name)
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

function highestEmvChild(node: EvaluatedNode): EvaluatedNode | undefined {
  let best: EvaluatedNode | undefined
  for (const child of node.children) {
    if (best === undefined || child.emv > best.emv) best = child
  }
  return best
}

/**
 * Names of the choices made along the optimal path. Chance nodes are
 * crossed through their highest-EMV child for display only; that child is
 * not an expectation and is not added to the path.
 */
export function optimalPath(tree: EvaluatedNode): string[] {
  const path: string[] = []
  let node: EvaluatedNode | undefined = tree

  while (node !== undefined && node.children.length > 0) {
    if (node.kind === 'decision') {
      const chosen: string | undefined = node.chosenChild
      if (chosen === undefined) break
      path.push(chosen)
      node = node.children.find((child) => child.name === chosen)
    } else {
      node = highestEmvChild(node)
    }
  }

  return path
}

/**
 * Convert an evaluated tree to its wire shape. Zero costs and empty child
 * lists are left out.
 */
export function toTreeReport(tree: EvaluatedNode): TreeReportNode {
  const reports = new Map<EvaluatedNode, TreeReportNode>()

  for (const node of postOrder(tree, (n) => n.children, (n) => n.name)) {
    const report: TreeReportNode = { name: node.name, type: node.kind, emv: node.emv }
    if (node.cost !== undefined && node.cost !== 0) report.cost = node.cost
    if (node.probability !== undefined) report.probability = node.probability
    if (node.payoff !== undefined) report.payoff = node.payoff
    if (node.chosenChild !== undefined) report.decision = node.chosenChild
    if (node.children.length > 0) {
      report.children = node.children.map((child) => lookup(reports, child, node.name))
    }
    reports.set(node, report)
  }

  return lookup(reports, tree, tree.name)
}

// ---------------------------------------------------------------------------
// Full analysis
// ---------------------------------------------------------------------------

/**
 * Build, roll back and report on a tree in one call: root EMV, optimal path,
 * annotated tree and a risk profile for each alternative of a decision root.
 */
export function analyzeDecisionTree(
  input: TreeNodeInput | undefined,
  options: RollbackOptions = {},
): DecisionTreeAnalysis {
  const tree = rollback(buildDecisionTree(input), options)
  const decisionPath = optimalPath(tree)

  // fromEntries defines own keys, so a node named "__proto__" is kept
  const riskProfiles: Record<string, RiskOutcome[]> =
    tree.kind === 'decision'
      ? Object.fromEntries(
          tree.children.map((alternative): [string, RiskOutcome[]] => [
            alternative.name,
            riskProfile(alternative),
          ]),
        )
      : {}

  return {
    rootEmv: tree.emv,
    optimalDecision: decisionPath[0] ?? null,
    decisionPath,
    tree,
    riskProfiles,
  }
}
