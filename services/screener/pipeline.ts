// Screener pipeline
// INIT -> G1 -> G2 -> G2B -> G3 -> G4 -> DONE, strictly linear. Each stage only sees the
// previous stage's survivors; an empty survivor set jumps straight to DONE.

import { loadConfig } from './config'
import { runExecutionGate, buildTradePlan } from './gates/execution'
import { runFundamentalsGate } from './gates/fundamentals'
import { resolveCapTier, runInstitutionalGate } from './gates/institutional'
import { runSpreadGate, sectorKey } from './gates/spread'
import { isCoilingSpring, runTechnicalsGate } from './gates/trend'
import { appendResults, attempt } from './rationale'
import type { GateStage } from './stage'
import type {
  Batch,
  Candidate,
  CandidateStatus,
  Instrument,
  PipelineState,
  RationaleTrail,
  ScanResult,
  ScreenerConfig,
  TradePlan
} from './types'

type GateState = Exclude<PipelineState, 'INIT' | 'DONE'>

export const STAGES: ReadonlyArray<{ state: GateState; stage: GateStage }> = [
  { state: 'G1', stage: { gate: 'Gate1_Spread', run: runSpreadGate } },
  { state: 'G2', stage: { gate: 'Gate2_Fundamentals', run: runFundamentalsGate } },
  { state: 'G2B', stage: { gate: 'Gate2B_Institutional', run: runInstitutionalGate } },
  { state: 'G3', stage: { gate: 'Gate3_Technicals', run: runTechnicalsGate } },
  { state: 'G4', stage: { gate: 'Gate4_Execution', run: runExecutionGate } }
]

// Keys that would alter the trail object's prototype instead of adding a row
const RESERVED_TICKERS = new Set(['__proto__', 'constructor', 'prototype'])

// Duplicate tickers keep their first occurrence
function uniqueInstruments(batch: Batch): Instrument[] {
  const seen = new Set<string>()
  const out: Instrument[] = []
  for (const inst of Array.isArray(batch?.instruments) ? batch.instruments : []) {
    const ticker = typeof inst?.ticker === 'string' ? inst.ticker.trim() : ''
    if (!ticker) {
      console.warn('[SCREENER_SKIP_INSTRUMENT]', { reason: 'missing ticker' })
      continue
    }
    if (RESERVED_TICKERS.has(ticker)) {
      console.warn('[SCREENER_SKIP_INSTRUMENT]', { ticker, reason: 'reserved ticker' })
      continue
    }
    if (seen.has(ticker)) {
      console.warn('[SCREENER_DUPLICATE_TICKER]', { ticker })
      continue
    }
    seen.add(ticker)
    out.push(ticker === inst.ticker ? inst : { ...inst, ticker })
  }
  return out
}

function patternOf(trail: RationaleTrail, ticker: string): string {
  return trail[ticker]?.Gate3_Technicals?.labels?.pattern || 'Trend'
}

// Entry/stop/target for every Gate 2B survivor, whatever happened to it afterwards
function tradePlans(instruments: Instrument[], trail: RationaleTrail, config: ScreenerConfig): Record<string, TradePlan | null> {
  const out: Record<string, TradePlan | null> = {}
  for (const inst of instruments) {
    const plan = attempt(inst.ticker, 'Gate4_Execution', () => buildTradePlan(inst.series, patternOf(trail, inst.ticker), config.execution))
    out[inst.ticker] = plan.ok ? plan.value : null
  }
  return out
}

function toCandidate(inst: Instrument, status: CandidateStatus, trail: RationaleTrail, trades: Record<string, TradePlan | null>): Candidate {
  const entry = trail[inst.ticker] || {}
  const g3 = entry.Gate3_Technicals
  const metrics: Record<string, number> = {}
  for (const key of ['adx', 'mrs', 'mrs_slope']) {
    const v = g3?.metrics[key]
    if (v != null) metrics[key] = v
  }
  return {
    ticker: inst.ticker,
    status,
    sector: entry.Gate1_Spread?.labels?.sector || sectorKey(inst.sector),
    capTier: resolveCapTier(entry.Gate2B_Institutional?.labels?.cap_tier ?? inst.capTier),
    pattern: patternOf(trail, inst.ticker),
    reason: (status === 'BUY' ? entry.Gate4_Execution?.reason : g3?.reason) || 'Consolidating',
    metrics,
    trade: trades[inst.ticker] ?? null
  }
}

export function runPipeline(batch: Batch, config: ScreenerConfig = loadConfig()): ScanResult {
  const instruments = uniqueInstruments(batch)
  const states: PipelineState[] = ['INIT']
  let trail: RationaleTrail = {}

  console.info('[SCREENER_SCAN_START]', { instruments: instruments.length })
  if (instruments.length === 0) {
    states.push('DONE')
    console.info('[SCREENER_SCAN_DONE]', { candidates: 0, reason: 'empty batch' })
    return { candidates: [], rationale: trail, trades: {}, states }
  }

  let survivors = instruments
  let cleared: Instrument[] = []
  let coiling: Instrument[] = []
  let buys: Instrument[] = []

  for (const { state, stage } of STAGES) {
    states.push(state)
    const out = stage.run(survivors, { batch, config, trail })
    trail = appendResults(trail, stage.gate, out.results)
    console.info('[SCREENER_GATE_DONE]', { gate: stage.gate, evaluated: survivors.length, survivors: out.survivors.length })

    if (state === 'G2B') cleared = out.survivors
    if (state === 'G3') {
      coiling = survivors.filter(i => isCoilingSpring(out.results.get(i.ticker)))
      if (coiling.length) console.info('[SCREENER_COILING_SPRINGS]', { count: coiling.length })
    }
    if (state === 'G4') buys = out.survivors
    survivors = out.survivors

    if (survivors.length === 0) {
      console.info('[SCREENER_SHORT_CIRCUIT]', { after: stage.gate, coiling: coiling.length })
      break
    }
  }

  states.push('DONE')
  const trades = tradePlans(cleared, trail, config)
  const candidates = [
    ...buys.map(i => toCandidate(i, 'BUY', trail, trades)),
    ...coiling.map(i => toCandidate(i, 'COILING_SPRING', trail, trades))
  ]
  console.info('[SCREENER_SCAN_DONE]', {
    candidates: candidates.length,
    buy: buys.length,
    coiling_spring: coiling.length,
    trade_plans: Object.keys(trades).length
  })
  return { candidates, rationale: trail, trades, states }
}
