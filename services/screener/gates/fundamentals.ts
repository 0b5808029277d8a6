// Gate 2 - Fundamental quality (Piotroski-style score + cash backing + pledge guard)

import { ComputeError, MissingFieldError, ScreenerError } from '../errors'
import { evaluateGuarded, fmt, gateResult } from '../rationale'
import { survivorsOf } from '../stage'
import type { StageContext, StageOutput } from '../stage'
import type { FinancialYear, Fundamentals, FundamentalsConfig, GateResult, Instrument } from '../types'

export type FScoreSignal =
  | 'roa_positive'
  | 'cfo_positive'
  | 'roa_improving'
  | 'cfo_exceeds_pat'
  | 'leverage_falling'
  | 'current_ratio_rising'
  | 'no_dilution'
  | 'gross_margin_rising'
  | 'asset_turnover_rising'

export type FScore = {
  score: number
  signals: Record<FScoreSignal, boolean>
  // signals that could not be evaluated (counted as failed)
  missing: FScoreSignal[]
}

type Year = 'current' | 'prior'

function field(f: Fundamentals, year: Year, key: keyof FinancialYear): number {
  const v = f[year]?.[key]
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new MissingFieldError(`${year}.${key}`)
  return v
}

function ratio(num: number, den: number, label: string): number {
  if (!(den > 0)) throw new ComputeError(`${label} has non-positive denominator`)
  return num / den
}

const SIGNALS: Record<FScoreSignal, (f: Fundamentals) => boolean> = {
  roa_positive: f => ratio(field(f, 'current', 'netIncome'), field(f, 'current', 'totalAssets'), 'roa') > 0,
  cfo_positive: f => field(f, 'current', 'cfo') > 0,
  roa_improving: f =>
    ratio(field(f, 'current', 'netIncome'), field(f, 'current', 'totalAssets'), 'roa') >
    ratio(field(f, 'prior', 'netIncome'), field(f, 'prior', 'totalAssets'), 'prior roa'),
  cfo_exceeds_pat: f => field(f, 'current', 'cfo') > field(f, 'current', 'netIncome'),
  leverage_falling: f =>
    ratio(field(f, 'current', 'longTermDebt'), field(f, 'current', 'totalAssets'), 'leverage') <
    ratio(field(f, 'prior', 'longTermDebt'), field(f, 'prior', 'totalAssets'), 'prior leverage'),
  current_ratio_rising: f =>
    ratio(field(f, 'current', 'currentAssets'), field(f, 'current', 'currentLiabilities'), 'current ratio') >
    ratio(field(f, 'prior', 'currentAssets'), field(f, 'prior', 'currentLiabilities'), 'prior current ratio'),
  no_dilution: f => field(f, 'current', 'sharesOutstanding') <= field(f, 'prior', 'sharesOutstanding'),
  gross_margin_rising: f =>
    ratio(field(f, 'current', 'grossProfit'), field(f, 'current', 'revenue'), 'gross margin') >
    ratio(field(f, 'prior', 'grossProfit'), field(f, 'prior', 'revenue'), 'prior gross margin'),
  asset_turnover_rising: f =>
    ratio(field(f, 'current', 'revenue'), field(f, 'current', 'totalAssets'), 'asset turnover') >
    ratio(field(f, 'prior', 'revenue'), field(f, 'prior', 'totalAssets'), 'prior asset turnover')
}

export const F_SCORE_SIGNALS: readonly FScoreSignal[] = [
  'roa_positive',
  'cfo_positive',
  'roa_improving',
  'cfo_exceeds_pat',
  'leverage_falling',
  'current_ratio_rising',
  'no_dilution',
  'gross_margin_rising',
  'asset_turnover_rising'
]

/**
 * Count of satisfied signals, 0-9. A signal whose inputs are missing or degenerate counts as
 * failed, so thin disclosure biases toward rejection.
 */
export function computeFScore(f: Fundamentals | null | undefined): FScore {
  const src: Fundamentals = f || {}
  const signals: Record<FScoreSignal, boolean> = {
    roa_positive: false,
    cfo_positive: false,
    roa_improving: false,
    cfo_exceeds_pat: false,
    leverage_falling: false,
    current_ratio_rising: false,
    no_dilution: false,
    gross_margin_rising: false,
    asset_turnover_rising: false
  }
  const missing: FScoreSignal[] = []
  for (const name of F_SCORE_SIGNALS) {
    try {
      signals[name] = SIGNALS[name](src)
    } catch (e) {
      if (!(e instanceof ScreenerError)) throw e
      signals[name] = false
      missing.push(name)
    }
  }
  const score = F_SCORE_SIGNALS.filter(s => signals[s]).length
  return { score, signals, missing }
}

// CFO / PAT, or null when PAT is missing or not positive
export function cfoToPat(f: Fundamentals | null | undefined): number | null {
  const cfo = f?.current?.cfo
  const pat = f?.current?.netIncome
  if (typeof cfo !== 'number' || typeof pat !== 'number' || !Number.isFinite(cfo) || !(pat > 0)) return null
  const out = cfo / pat
  return Number.isFinite(out) ? out : null
}

export function evaluateFundamentals(f: Fundamentals | null | undefined, cfg: FundamentalsConfig): GateResult {
  const fscore = computeFScore(f)
  const cfoPat = cfoToPat(f)
  const pledgeRaw = f?.promoterPledgePct
  const pledge = typeof pledgeRaw === 'number' && Number.isFinite(pledgeRaw) ? pledgeRaw : null

  const metrics: Record<string, number | null> = {
    f_score: fscore.score,
    cfo_pat: cfoPat,
    promoter_pledge: pledge
  }
  for (const s of F_SCORE_SIGNALS) metrics[s] = fscore.signals[s] ? 1 : 0

  const fails: string[] = []
  if (fscore.score < cfg.minFScore) fails.push(`F-Score ${fscore.score} < ${cfg.minFScore}`)
  if (cfoPat == null) fails.push('CFO/PAT unavailable')
  else if (cfoPat < cfg.minCfoPat) fails.push(`CFO/PAT ${fmt(cfoPat)} < ${fmt(cfg.minCfoPat)}`)
  if (pledge == null) fails.push('Promoter pledge undisclosed')
  else if (pledge > cfg.maxPromoterPledge) fails.push(`Promoter pledge ${fmt(pledge)}% > ${fmt(cfg.maxPromoterPledge)}%`)

  const missingNote = fscore.missing.length ? ` (unscored: ${fscore.missing.join(', ')})` : ''
  if (fails.length) return gateResult('hard_fail', metrics, fails.join('; ') + missingNote)
  return gateResult(
    'pass',
    metrics,
    `F-Score ${fscore.score}/9, CFO/PAT ${fmt(cfoPat ?? 0)}, pledge ${fmt(pledge ?? 0)}%${missingNote}`
  )
}

export function runFundamentalsGate(instruments: Instrument[], ctx: StageContext): StageOutput {
  const cfg = ctx.config.fundamentals
  const results = new Map<string, GateResult>()
  for (const inst of instruments) {
    results.set(inst.ticker, evaluateGuarded(inst.ticker, 'Gate2_Fundamentals', () => evaluateFundamentals(inst.fundamentals, cfg)))
  }
  return { survivors: survivorsOf(instruments, results), results }
}
