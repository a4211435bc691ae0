/**
 * Risk profiles: the distribution of terminal payoffs reachable once a
 * decision alternative is taken, assuming every later decision follows its
 * rolled-back optimum.
 */

import { ValidationError } from './errors'
import type { EvaluatedNode, RiskOutcome, RiskProfileSummary } from './types'

interface Frame {
  node: EvaluatedNode
  probability: number
}

/**
 * Enumerate terminal outcomes under an evaluated subtree, depth-first in
 * input order. Chance nodes branch into every child, multiplying the running
 * probability; decision nodes follow their chosen child only. Costs along
 * the way are not netted out of the terminal payoffs.
 */
export function riskProfile(alternative: EvaluatedNode): RiskOutcome[] {
  const outcomes: RiskOutcome[] = []
  const stack: Frame[] = [{ node: alternative, probability: 1 }]

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node, probability } = frame

    if (node.kind === 'terminal' || node.children.length === 0) {
      outcomes.push({ name: node.name, probability, payoff: node.payoff ?? node.emv })
      continue
    }

    if (node.kind === 'chance') {
      // Reverse push keeps input order on pop
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i]
        stack.push({ node: child, probability: probability * (child.probability ?? 0) })
      }
      continue
    }

    const chosen = node.children.find((child) => child.name === node.chosenChild)
    if (chosen) stack.push({ node: chosen, probability })
  }

  return outcomes
}

/** Expected payoff, range and loss probability of one risk profile. */
export function summarizeRiskProfile(outcomes: readonly RiskOutcome[]): RiskProfileSummary {
  if (outcomes.length === 0) {
    throw new ValidationError('Cannot summarize an empty risk profile')
  }

  let expectedPayoff = 0
  let totalProbability = 0
  let lossProbability = 0
  let minPayoff = Infinity
  let maxPayoff = -Infinity

  for (const { probability, payoff } of outcomes) {
    expectedPayoff += probability * payoff
    totalProbability += probability
    if (payoff < 0) lossProbability += probability
    minPayoff = Math.min(minPayoff, payoff)
    maxPayoff = Math.max(maxPayoff, payoff)
  }

  return { expectedPayoff, minPayoff, maxPayoff, totalProbability, lossProbability }
}
