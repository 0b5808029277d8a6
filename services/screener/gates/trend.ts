// Gate 3 - Technical trend
// Test 1 (trend template) is structural: failing it rejects outright.
// Test 2 (ADX + Mansfield RS slope) is momentum: failing it only parks the name as a coiling spring.

import { adx, linearSlope, mansfieldRs, sma } from '../../lib/indicators'
import { ComputeError, InsufficientHistoryError } from '../errors'
import { evaluateGuarded, fmt, gateResult } from '../rationale'
import { survivorsOf } from '../stage'
import type { StageContext, StageOutput } from '../stage'
import type { Bar, GateResult, Instrument, TechnicalsConfig } from '../types'

export type TrendPattern = 'VCP' | 'Trend'

export type TrendStatus = 'TREND_CONFIRMED' | 'COILING_SPRING' | 'REJECTED'

export type TemplateCheck = {
  close: number
  maShort: number
  maMid: number
  maLong: number
  maLongPrior: number
  fails: string[]
}

export type StrengthCheck = {
  adx: number | null
  mrs: number | null
  mrsSlope: number | null
  fails: string[]
}

export function trendTemplate(closes: number[], cfg: TechnicalsConfig): TemplateCheck {
  const required = cfg.maLong + cfg.maLongTrendSessions
  if (closes.length < required) throw new InsufficientHistoryError(required, closes.length)
  const last = closes.length - 1
  const close = closes[last]
  const maShort = sma(closes, cfg.maShort)
  const maMid = sma(closes, cfg.maMid)
  const maLong = sma(closes, cfg.maLong)
  const maLongPrior = sma(closes, cfg.maLong, last - cfg.maLongTrendSessions)
  if (maShort == null || maMid == null || maLong == null || maLongPrior == null) {
    throw new ComputeError('moving average is not finite')
  }

  const fails: string[] = []
  if (!(close > maShort)) fails.push(`close ${fmt(close)} ≤ MA${cfg.maShort} ${fmt(maShort)}`)
  if (!(close > maMid)) fails.push(`close ${fmt(close)} ≤ MA${cfg.maMid} ${fmt(maMid)}`)
  if (!(close > maLong)) fails.push(`close ${fmt(close)} ≤ MA${cfg.maLong} ${fmt(maLong)}`)
  if (!(maShort > maMid && maMid > maLong)) fails.push(`MAs not stacked (MA${cfg.maShort} > MA${cfg.maMid} > MA${cfg.maLong})`)
  if (!(maLong > maLongPrior)) fails.push(`MA${cfg.maLong} not rising over ${cfg.maLongTrendSessions} sessions`)
  return { close, maShort, maMid, maLong, maLongPrior, fails }
}

// Instrument closes paired with benchmark closes on shared dates, oldest first
export function alignWithBenchmark(series: Bar[], benchmark: Bar[]): { closes: number[]; bench: number[] } {
  const byDate = new Map<string, number>()
  for (const b of benchmark) byDate.set(b.date, b.close)
  const closes: number[] = []
  const bench: number[] = []
  for (const bar of series) {
    const b = byDate.get(bar.date)
    if (b == null) continue
    closes.push(bar.close)
    bench.push(b)
  }
  return { closes, bench }
}

export function strengthTest(series: Bar[], benchmark: Bar[] | null | undefined, cfg: TechnicalsConfig): StrengthCheck {
  const fails: string[] = []

  const adxVal = adx(series.map(b => b.high), series.map(b => b.low), series.map(b => b.close), cfg.adxPeriod)
  if (adxVal == null) fails.push('ADX unavailable')
  else if (adxVal < cfg.minAdx) fails.push(`ADX ${fmt(adxVal)} < ${fmt(cfg.minAdx)}`)

  let mrs: number | null = null
  let mrsSlope: number | null = null
  if (!benchmark || benchmark.length === 0) {
    fails.push('RS unavailable: no benchmark series')
  } else {
    const lookback = cfg.rsLookbackWeeks * 5
    const required = lookback + cfg.rsSlopeSessions - 1
    const { closes, bench } = alignWithBenchmark(series, benchmark)
    const rs = closes.length >= required ? mansfieldRs(closes, bench, lookback) : null
    if (closes.length < required) {
      fails.push(`RS unavailable: ${closes.length} shared sessions < ${required} required`)
    } else if (!rs || rs.length < cfg.rsSlopeSessions) {
      fails.push('RS unavailable: benchmark data invalid')
    } else {
      mrs = rs[rs.length - 1]
      mrsSlope = linearSlope(rs.slice(-cfg.rsSlopeSessions))
      if (mrsSlope == null) fails.push('RS Slope unavailable')
      else if (mrsSlope < cfg.minMansfieldSlope) fails.push(`RS Slope ${fmt(mrsSlope, 4)} < ${fmt(cfg.minMansfieldSlope, 4)}`)
    }
  }

  return { adx: adxVal, mrs, mrsSlope, fails }
}

/**
 * Volatility contraction: each of the last three segments trades in a strictly tighter range
 * than the one before, and the last one is tight in absolute terms.
 */
export function detectPattern(series: Bar[], cfg: TechnicalsConfig): TrendPattern {
  const seg = cfg.vcpSegmentBars
  if (series.length < seg * 3) return 'Trend'
  const ranges: number[] = []
  for (let k = 3; k >= 1; k--) {
    const end = series.length - (k - 1) * seg
    const bars = series.slice(end - seg, end)
    let hi = -Infinity
    let lo = Infinity
    for (const b of bars) {
      if (b.high > hi) hi = b.high
      if (b.low < lo) lo = b.low
    }
    if (!(hi > 0)) return 'Trend'
    ranges.push((hi - lo) / hi)
  }
  const [r1, r2, r3] = ranges
  return r1 > r2 && r2 > r3 && r3 <= cfg.vcpMaxFinalRangePct ? 'VCP' : 'Trend'
}

export function evaluateTechnicals(inst: Instrument, benchmark: Bar[] | null | undefined, cfg: TechnicalsConfig): GateResult {
  const series = Array.isArray(inst.series) ? inst.series : []
  const template = trendTemplate(series.map(b => b.close), cfg)
  const base = {
    close: template.close,
    ma_short: template.maShort,
    ma_mid: template.maMid,
    ma_long: template.maLong
  }

  if (template.fails.length) {
    return gateResult('hard_fail', base, `Trend template failed: ${template.fails.join('; ')}`, { status: 'REJECTED' })
  }

  const strength = strengthTest(series, benchmark, cfg)
  const pattern = detectPattern(series, cfg)
  const metrics = { ...base, adx: strength.adx, mrs: strength.mrs, mrs_slope: strength.mrsSlope }

  if (strength.fails.length) {
    return gateResult('soft_fail', metrics, strength.fails.join('; '), { status: 'COILING_SPRING', pattern })
  }
  return gateResult(
    'pass',
    metrics,
    `Trend confirmed: ADX ${fmt(strength.adx ?? 0)}, RS slope ${fmt(strength.mrsSlope ?? 0, 4)}, pattern ${pattern}`,
    { status: 'TREND_CONFIRMED', pattern }
  )
}

export function runTechnicalsGate(instruments: Instrument[], ctx: StageContext): StageOutput {
  const cfg = ctx.config.technicals
  const results = new Map<string, GateResult>()
  for (const inst of instruments) {
    results.set(inst.ticker, evaluateGuarded(inst.ticker, 'Gate3_Technicals', () => evaluateTechnicals(inst, ctx.batch.benchmark, cfg)))
  }
  return { survivors: survivorsOf(instruments, results), results }
}

export function isCoilingSpring(result: GateResult | undefined): boolean {
  return result?.outcome === 'soft_fail'
}
