import { Hono } from 'hono'
import { decisionTreeRequestSchema } from '@forge-validator/shared'
import { analyzeDecisionTree, summarizeRiskProfile, toTreeReport } from '@forge-validator/valuation-engine'
import type { RiskProfileSummary } from '@forge-validator/valuation-engine'
import { validatorName, type AppEnv } from '../lib/context'
import { success } from '../lib/envelope'
import type { Env } from '../lib/env'
import { parseBody, isResponse } from '../lib/validate'

const VALIDATOR = 'decision-tree'

export function decisionTreeRoutes(config: Pick<Env, 'PROBABILITY_TOLERANCE' | 'MISSING_PROBABILITIES'>) {
  const routes = new Hono<AppEnv>()
  routes.use('*', validatorName(VALIDATOR))

  // POST /decision-tree — roll back a tree and report the optimal strategy
  routes.post('/', async (c) => {
    const body = await parseBody(c, decisionTreeRequestSchema, VALIDATOR)
    if (isResponse(body)) return body

    const analysis = analyzeDecisionTree(body.tree, {
      missingProbabilities: body.missingProbabilities ?? config.MISSING_PROBABILITIES,
      probabilityTolerance: config.PROBABILITY_TOLERANCE,
    })

    const riskSummaries: Record<string, RiskProfileSummary> = Object.fromEntries(
      Object.entries(analysis.riskProfiles).map(([name, outcomes]): [string, RiskProfileSummary] => [
        name,
        summarizeRiskProfile(outcomes),
      ]),
    )

    c.get('logger').debug('decision_tree_evaluated', {
      rootEmv: analysis.rootEmv,
      optimalDecision: analysis.optimalDecision,
    })

    return c.json(
      success(VALIDATOR, {
        rootEmv: analysis.rootEmv,
        optimalDecision: analysis.optimalDecision,
        decisionPath: analysis.decisionPath,
        tree: toTreeReport(analysis.tree),
        riskProfiles: analysis.riskProfiles,
        riskSummaries,
      }),
    )
  })

  return routes
}
