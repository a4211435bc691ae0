import { describe, it, expect } from 'vitest'
import { createApp } from '../app'
import { loadEnv } from '../lib/env'
import { createLogger, type LogSink } from '../lib/log'

/**
 * End-to-end checks of the validator routes through `app.request`:
 * envelopes, status codes and the error mapping.
 */

const config = loadEnv({ LOG_LEVEL: 'silent' })
const app = createApp(config)

function post(path: string, payload: unknown, target = app) {
  return target.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  })
}

function investmentTree(successProbability: number) {
  return {
    name: 'Investment Decision',
    type: 'decision',
    children: [
      {
        name: 'Invest',
        type: 'chance',
        cost: 100000,
        children: [
          { name: 'Success', type: 'terminal', probability: successProbability, payoff: 300000 },
          { name: 'Failure', type: 'terminal', probability: 0.3, payoff: 50000 },
        ],
      },
      { name: "Don't Invest", type: 'terminal', payoff: 0 },
    ],
  }
}

const investment = investmentTree(0.7)

// ─── Service ───────────────────────────────────────────────────────────────

describe('Service', () => {
  it('GET /health returns ok', async () => {
    const res = await app.request('/health')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok' })
  })

  it('GET / returns service info', async () => {
    const res = await app.request('/')
    expect(await res.json()).toEqual({ name: 'forge-validator', version: '1.0.0' })
  })

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('/nonexistent')
    expect(res.status).toBe(404)
    const body = await res.json()
    expect(body.success).toBe(false)
    expect(body.error).toBe('Not found.')
  })

  it('maps unexpected errors to 500 and logs them', async () => {
    const entries: Record<string, unknown>[] = []
    const sink: LogSink = (line) => {
      entries.push(JSON.parse(line))
    }
    const local = createApp(config, createLogger('error', sink))
    local.get('/boom', () => {
      throw new Error('boom')
    })

    const res = await local.request('/boom')
    expect(res.status).toBe(500)
    const body = await res.json()
    expect(body.error).toBe('Internal server error.')
    expect(body.validator).toBe('forge-validator')

    const logged = entries.find((e) => e.event === 'unhandled_error')
    expect(logged?.error).toBe('boom')
    expect(logged?.path).toBe('/boom')
  })
})

// ─── Decision Trees ────────────────────────────────────────────────────────

describe('POST /decision-tree', () => {
  it('rolls back the investment tree', async () => {
    const res = await post('/decision-tree', { tree: investment })
    expect(res.status).toBe(200)

    const body = await res.json()
    expect(body.validator).toBe('decision-tree')
    expect(body.version).toBe('1.0.0')
    expect(body.success).toBe(true)
    expect(body.results.rootEmv).toBeCloseTo(125000, 6)
    expect(body.results.optimalDecision).toBe('Invest')
    expect(body.results.decisionPath).toEqual(['Invest'])
    expect(body.results.tree.decision).toBe('Invest')
    expect(body.results.tree.children[0].cost).toBe(100000)
  })

  it('reports a risk profile and summary per alternative', async () => {
    const body = await (await post('/decision-tree', { tree: investment })).json()

    expect(body.results.riskProfiles.Invest).toEqual([
      { name: 'Success', probability: 0.7, payoff: 300000 },
      { name: 'Failure', probability: 0.3, payoff: 50000 },
    ])
    expect(body.results.riskProfiles["Don't Invest"]).toEqual([
      { name: "Don't Invest", probability: 1, payoff: 0 },
    ])
    const summary = body.results.riskSummaries.Invest
    expect(summary.expectedPayoff).toBeCloseTo(225000, 6)
    expect(summary.minPayoff).toBe(50000)
    expect(summary.maxPayoff).toBe(300000)
    expect(summary.lossProbability).toBe(0)
  })

  it('returns 422 when chance probabilities do not sum to 1', async () => {
    const res = await post('/decision-tree', { tree: investmentTree(0.6) })

    expect(res.status).toBe(422)
    const body = await res.json()
    expect(body.success).toBe(false)
    expect(body.results).toBeNull()
    expect(body.validator).toBe('decision-tree')
    expect(body.code).toBe('probability')
    expect(body.error).toMatch(/^Chance node "Invest": child probabilities sum to/)
  })

  it('returns 422 for a terminal node without a payoff', async () => {
    const res = await post('/decision-tree', {
      tree: { name: 'Root', children: [{ name: 'Leaf', type: 'terminal' }] },
    })
    expect(res.status).toBe(422)
    const body = await res.json()
    expect(body.code).toBe('tree-structure')
    expect(body.error).toBe('Node "Leaf": terminal nodes require a payoff')
  })

  it('reports an alternative named __proto__', async () => {
    const res = await post('/decision-tree', {
      tree: {
        name: 'Root',
        children: [
          { name: '__proto__', payoff: 5 },
          { name: 'B', payoff: 1 },
        ],
      },
    })
    expect(res.status).toBe(200)
    const body = await res.json()
    expect(Object.keys(body.results.riskProfiles)).toEqual(['__proto__', 'B'])
    expect(Object.keys(body.results.riskSummaries)).toEqual(['__proto__', 'B'])
    expect(Object.getOwnPropertyDescriptor(body.results.riskSummaries, '__proto__')?.value.maxPayoff).toBe(5)
  })

  it('returns 400 when the tree is missing', async () => {
    const res = await post('/decision-tree', {})
    expect(res.status).toBe(400)
    const body = await res.json()
    expect(body.fields.tree).toBeDefined()
  })

  it('applies the configured missing-probability policy unless the request overrides it', async () => {
    const strict = createApp(loadEnv({ LOG_LEVEL: 'silent', MISSING_PROBABILITIES: 'reject' }))
    const tree = {
      name: 'Root',
      children: [
        {
          name: 'Gamble',
          type: 'chance',
          children: [
            { name: 'Win', payoff: 10 },
            { name: 'Lose', payoff: -10 },
          ],
        },
      ],
    }

    const rejected = await post('/decision-tree', { tree }, strict)
    expect(rejected.status).toBe(422)
    expect((await rejected.json()).code).toBe('probability')

    const uniform = await post('/decision-tree', { tree, missingProbabilities: 'uniform' }, strict)
    expect(uniform.status).toBe(200)
    const body = await uniform.json()
    expect(body.results.rootEmv).toBe(0)
    expect(body.results.riskSummaries.Gamble.lossProbability).toBe(0.5)
  })
})

// ─── Option Pricing ────────────────────────────────────────────────────────

describe('POST /options/price', () => {
  it('closed form with Greeks by default', async () => {
    const res = await post('/options/price', { S: 100, K: 100 })
    expect(res.status).toBe(200)

    const body = await res.json()
    expect(body.validator).toBe('option-pricing')
    expect(body.results.model).toBe('black_scholes')
    expect(body.results.optionType).toBe('call')
    expect(body.results.price).toBeCloseTo(14.2313, 3)
    expect(body.results.greeks.delta).toBeCloseTo(0.624252, 5)
    expect(body.results.inputs).toEqual({ S: 100, K: 100, r: 0.05, sigma: 0.3, T: 1, q: 0 })
  })

  it('accepts an upper-case option type', async () => {
    const body = await (await post('/options/price', { S: 100, K: 100, optionType: 'PUT' })).json()
    expect(body.results.optionType).toBe('put')
    expect(body.results.price).toBeCloseTo(9.3542, 3)
  })

  it('returns null Greeks at expiry', async () => {
    const body = await (await post('/options/price', { S: 110, K: 100, T: 0 })).json()
    expect(body.results.price).toBe(10)
    expect(body.results.greeks).toBeNull()
    expect(body.results.timeValue).toBe(0)
  })

  it('prices on the lattice with diagnostics', async () => {
    const body = await (await post('/options/price', { S: 100, K: 100, model: 'binomial' })).json()
    expect(body.results.model).toBe('binomial')
    expect(body.results.steps).toBe(100)
    expect(body.results.american).toBe(false)
    expect(body.results.price).toBeCloseTo(14.201831, 4)
    expect(body.results.u).toBeCloseTo(1.0304545, 7)
    expect(body.results.d).toBeCloseTo(0.9704455, 7)
    expect(body.results.p).toBeCloseTo(0.5008347, 7)
    expect(body.results.exerciseBoundary).toBeUndefined()
  })

  it('American put reports its exercise boundary', async () => {
    const body = await (
      await post('/options/price', {
        S: 100,
        K: 100,
        optionType: 'put',
        model: 'binomial',
        american: true,
      })
    ).json()
    expect(body.results.price).toBeCloseTo(9.855995, 4)
    expect(body.results.exerciseBoundary).toHaveLength(101)
    expect(body.results.exerciseBoundary[100]).toBe(100)
  })

  it('returns 400 when the strike is missing', async () => {
    const res = await post('/options/price', { S: 100 })
    expect(res.status).toBe(400)
    const body = await res.json()
    expect(body.error).toBe("Validation failed: Option pricing requires 'K' (strike)")
  })

  it('returns 422 for zero volatility before expiry', async () => {
    const res = await post('/options/price', { S: 100, K: 100, sigma: 0 })
    expect(res.status).toBe(422)
    expect((await res.json()).code).toBe('numerical-domain')
  })

  it('returns 422 for American exercise in the closed form', async () => {
    const res = await post('/options/price', { S: 100, K: 100, american: true })
    expect(res.status).toBe(422)
    expect((await res.json()).error).toBe(
      'Closed-form pricing covers European exercise only; use the binomial model',
    )
  })

  it('returns 422 instead of a non-finite lattice price', async () => {
    const res = await post('/options/price', { S: 100, K: 100, sigma: 800, model: 'binomial', n: 1 })
    expect(res.status).toBe(422)
    const body = await res.json()
    expect(body.success).toBe(false)
    expect(body.code).toBe('numerical-domain')
  })

  it('enforces the lattice step limit', async () => {
    const limited = createApp(loadEnv({ LOG_LEVEL: 'silent', MAX_LATTICE_STEPS: '200' }))
    const res = await post('/options/price', { S: 100, K: 100, model: 'binomial', n: 500 }, limited)
    expect(res.status).toBe(422)
    const body = await res.json()
    expect(body.validator).toBe('option-pricing')
    expect(body.error).toBe('Lattice step count 500 exceeds the limit of 200')
  })
})

describe('POST /options/convergence', () => {
  it('tabulates lattice prices against the closed form', async () => {
    const res = await post('/options/convergence', { S: 100, K: 100 })
    expect(res.status).toBe(200)

    const body = await res.json()
    expect(body.validator).toBe('option-convergence')
    expect(body.results.closedForm).toBeCloseTo(14.2313, 3)
    expect(body.results.rows.map((r: { steps: number }) => r.steps)).toEqual([10, 50, 100, 500])
    expect(body.results.rows.map((r: { withinTolerance: boolean }) => r.withinTolerance)).toEqual([
      false,
      false,
      false,
      true,
    ])
  })

  it('rejects step counts above the limit', async () => {
    const limited = createApp(loadEnv({ LOG_LEVEL: 'silent', MAX_LATTICE_STEPS: '200' }))
    const res = await post('/options/convergence', { S: 100, K: 100 }, limited)
    expect(res.status).toBe(422)
    expect((await res.json()).validator).toBe('option-convergence')
  })
})

// ─── Real Options ──────────────────────────────────────────────────────────

describe('POST /real-options', () => {
  it('values the option to delay', async () => {
    const body = await (await post('/real-options', { kind: 'delay', V: 150, I: 100 })).json()
    expect(body.validator).toBe('real-options')
    expect(body.results.kind).toBe('delay')
    expect(body.results.optionValue).toBeCloseTo(55.8762, 3)
    expect(body.results.npvIfInvestNow).toBe(50)
    expect(body.results.recommendation).toBe('wait')
  })

  it('values the option to abandon', async () => {
    const body = await (
      await post('/real-options', { kind: 'abandon', V: 100, salvageValue: 80 })
    ).json()
    expect(body.results.optionValue).toBeCloseTo(2.5604, 3)
  })

  it('returns 422 for an expansion factor that adds nothing', async () => {
    const res = await post('/real-options', {
      kind: 'expand',
      V: 100,
      expansionCost: 20,
      expansionFactor: 1,
    })
    expect(res.status).toBe(422)
    expect((await res.json()).code).toBe('validation')
  })

  it('returns 400 for an unknown kind', async () => {
    const res = await post('/real-options', { kind: 'contract', V: 100 })
    expect(res.status).toBe(400)
    expect((await res.json()).fields.kind).toBeDefined()
  })
})
