import { runPipeline } from '../pipeline'
import { gatesFor } from '../rationale'
import { GATE_ORDER } from '../types'
import { acceleratingCloses, barsFromCloses, makeInstrument, mixedBatch, testConfig } from './helpers'

const config = testConfig()

describe('screener pipeline', () => {
  it('empty batch goes straight to DONE', () => {
    expect(runPipeline({ instruments: [] }, config)).toEqual({ candidates: [], rationale: {}, trades: {}, states: ['INIT', 'DONE'] })
  })

  it('runs every stage and emits a BUY with a trade plan', () => {
    const batch = mixedBatch()
    const result = runPipeline(batch, config)

    expect(result.states).toEqual(['INIT', 'G1', 'G2', 'G2B', 'G3', 'G4', 'DONE'])
    expect(result.candidates.map(c => [c.ticker, c.status])).toEqual([
      ['A', 'BUY'],
      ['F', 'COILING_SPRING']
    ])

    const buy = result.candidates[0]
    expect(buy.sector).toBe('Unknown')
    expect(buy.capTier).toBe('LARGE')
    expect(buy.pattern).toBe('Trend')
    expect(buy.reason).toBe(result.rationale.A.Gate4_Execution?.reason)
    expect(buy.metrics.adx).toBeCloseTo(100, 6)
    const trade = buy.trade
    expect(trade).not.toBeNull()
    if (trade) {
      expect(trade.target).toBe(trade.entry + 2 * (trade.entry - trade.stop))
      expect(trade.riskReward).toBe(2)
      expect(trade.holdingPeriod).toBe('Positional (1-3 Months)')
    }

    const spring = result.candidates[1]
    expect(spring.reason).toBe('RS unavailable: 0 shared sessions < 269 required')
    expect(spring.trade).not.toBeNull()
  })

  it('each instrument stops at its first failing gate', () => {
    const { rationale } = runPipeline(mixedBatch(), config)
    expect(Object.fromEntries(Object.keys(rationale).map(t => [t, gatesFor(rationale, t).length]))).toEqual({
      A: 5, B: 1, C: 2, D: 3, E: 4, F: 4
    })
    for (const ticker of Object.keys(rationale)) {
      const gates = gatesFor(rationale, ticker)
      expect(gates).toEqual(GATE_ORDER.slice(0, gates.length))
      for (const g of gates.slice(0, -1)) expect(rationale[ticker][g]?.passed).toBe(true)
    }
    expect(rationale.E.Gate3_Technicals?.labels?.status).toBe('REJECTED')
    expect(rationale.F.Gate3_Technicals?.outcome).toBe('soft_fail')
    expect(rationale.D.Gate2B_Institutional?.reason).toBe('Inst. ownership 1.00% < 10.00% (LARGE); Free float 1.00% < 15.00% (LARGE)')
  })

  it('computes trade levels for every institutional-gate survivor', () => {
    const batch = mixedBatch()
    const accelerating = barsFromCloses(acceleratingCloses())
    const thin = accelerating.map((b, i) => (i === accelerating.length - 1 ? { ...b, volume: 100 } : b))
    batch.instruments.push(makeInstrument({ ticker: 'G', series: thin }))
    const result = runPipeline(batch, config)

    expect(Object.keys(result.trades)).toEqual(['A', 'E', 'F', 'G'])
    expect(result.rationale.E.Gate3_Technicals?.labels?.status).toBe('REJECTED')
    expect(result.trades.E).toEqual({ entry: 100, stop: 96, target: 108, holdingPeriod: 'Positional (1-3 Months)', riskReward: 2 })

    expect(result.rationale.G.Gate4_Execution?.reason).toBe('Volume 100 < prorated 850')
    const g = result.trades.G
    expect(g).not.toBeNull()
    if (g) expect(g.target).toBe(g.entry + 2 * (g.entry - g.stop))

    expect(result.candidates.map(c => c.ticker)).toEqual(['A', 'F'])
    expect(result.candidates[0].trade).toBe(result.trades.A)
  })

  it('no trade levels when nothing clears the institutional gate', () => {
    const result = runPipeline({ instruments: [makeInstrument({ ticker: 'A', institutional: null })] }, config)
    expect(result.states).toEqual(['INIT', 'G1', 'G2', 'G2B', 'DONE'])
    expect(result.trades).toEqual({})
  })

  it('candidates all passed the institutional gate', () => {
    const { candidates, rationale } = runPipeline(mixedBatch(), config)
    for (const c of candidates) expect(rationale[c.ticker].Gate2B_Institutional?.passed).toBe(true)
  })

  it('short-circuits when a stage leaves no survivors', () => {
    const batch = { instruments: [makeInstrument({ ticker: 'A', fundamentals: null }), makeInstrument({ ticker: 'B', fundamentals: {} })] }
    const result = runPipeline(batch, config)
    expect(result.states).toEqual(['INIT', 'G1', 'G2', 'DONE'])
    expect(result.candidates).toEqual([])
    expect(gatesFor(result.rationale, 'B')).toEqual(['Gate1_Spread', 'Gate2_Fundamentals'])
  })

  it('coiling springs survive an empty technical stage', () => {
    const result = runPipeline({ instruments: [makeInstrument({ ticker: 'A' })], benchmark: null }, config)
    expect(result.states).toEqual(['INIT', 'G1', 'G2', 'G2B', 'G3', 'DONE'])
    expect(result.candidates.map(c => [c.ticker, c.status, c.reason])).toEqual([
      ['A', 'COILING_SPRING', 'RS unavailable: no benchmark series']
    ])
    expect(result.rationale.A.Gate4_Execution).toBeUndefined()
  })

  it('weak momentum never reaches the execution gate', () => {
    const strict = testConfig({ technicals: { minAdx: 101 } })
    const batch = mixedBatch()
    const result = runPipeline(batch, strict)
    expect(result.candidates.map(c => [c.ticker, c.status])).toEqual([
      ['A', 'COILING_SPRING'],
      ['F', 'COILING_SPRING']
    ])
    expect(result.rationale.A.Gate3_Technicals?.reason).toBe('ADX 100.00 < 101.00')
    expect(result.rationale.A.Gate4_Execution).toBeUndefined()
  })

  it('drops duplicate and blank tickers', () => {
    const result = runPipeline({
      instruments: [
        makeInstrument({ ticker: 'A' }),
        makeInstrument({ ticker: 'A', fundamentals: null }),
        makeInstrument({ ticker: ' ' })
      ]
    }, config)
    expect(Object.keys(result.rationale)).toEqual(['A'])
    expect(result.rationale.A.Gate2_Fundamentals?.passed).toBe(true)
  })

  it('skips tickers that collide with object internals', () => {
    const result = runPipeline({ instruments: [makeInstrument({ ticker: '__proto__' }), makeInstrument({ ticker: 'A' })] }, config)
    expect(Object.keys(result.rationale)).toEqual(['A'])
    expect(Object.getPrototypeOf(result.rationale)).toBe(Object.prototype)
    expect(result.rationale.A.Gate1_Spread?.passed).toBe(true)
  })

  it('trail is frozen plain JSON', () => {
    const { rationale } = runPipeline(mixedBatch(), config)
    expect(JSON.parse(JSON.stringify(rationale))).toEqual(rationale)
    expect(Object.isFrozen(rationale.A.Gate1_Spread)).toBe(true)
    expect(Object.isFrozen(rationale.A.Gate1_Spread?.metrics)).toBe(true)
  })
})
