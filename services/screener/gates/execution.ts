// Gate 4 - Execution timing: prorated volume confirmation + ATR risk/reward

import { atr, mean } from '../../lib/indicators'
import { InsufficientHistoryError } from '../errors'
import { evaluateGuarded, fmt, gateResult } from '../rationale'
import { survivorsOf } from '../stage'
import type { StageContext, StageOutput } from '../stage'
import type { Bar, ExecutionConfig, GateResult, HoldingPeriod, Instrument, TradePlan } from '../types'

export type VolumeCheck = {
  current: number
  average: number
  sessionFraction: number
  expected: number
  ok: boolean
}

export type TradeLevels = {
  entry: number
  atr: number
  stop: number
  target: number
  risk: number
  reward: number
  riskReward: number
}

export function sessionFraction(elapsedMinutes: number | null | undefined, cfg: ExecutionConfig): number {
  if (typeof elapsedMinutes !== 'number' || !Number.isFinite(elapsedMinutes)) return 1
  return Math.min(1, Math.max(0, elapsedMinutes / cfg.marketOpenMinutes))
}

export function volumeCheck(series: Bar[], elapsedMinutes: number | null | undefined, cfg: ExecutionConfig): VolumeCheck {
  const required = cfg.volAvgDays + 1
  if (series.length < required) throw new InsufficientHistoryError(required, series.length)
  const current = series[series.length - 1].volume
  const average = mean(series.slice(-required, -1).map(b => b.volume)) ?? 0
  const fraction = sessionFraction(elapsedMinutes, cfg)
  const expected = average * fraction * cfg.volProrateFactor
  return { current, average, sessionFraction: fraction, expected, ok: current >= expected }
}

/**
 * Entry at the last close, stop ATR multiples below, target at rewardMultiple x risk above.
 * reward is built from risk so reward/risk equals rewardMultiple exactly.
 */
export function tradeLevels(series: Bar[], cfg: ExecutionConfig): TradeLevels {
  const atrVal = atr(series.map(b => b.high), series.map(b => b.low), series.map(b => b.close), cfg.atrPeriod)
  if (atrVal == null) throw new InsufficientHistoryError(cfg.atrPeriod + 1, series.length)
  const entry = series[series.length - 1].close
  const stop = entry - cfg.atrStopMultiplier * atrVal
  const risk = entry - stop
  const reward = cfg.rewardMultiple * risk
  const target = entry + cfg.rewardMultiple * (entry - stop)
  return { entry, atr: atrVal, stop, target, risk, reward, riskReward: risk > 0 ? reward / risk : 0 }
}

export function riskFailures(levels: TradeLevels, cfg: ExecutionConfig): string[] {
  const fails: string[] = []
  if (!(levels.atr > 0)) fails.push('ATR is zero')
  if (!(levels.stop < levels.entry)) fails.push(`stop ${fmt(levels.stop)} not below entry ${fmt(levels.entry)}`)
  else if (levels.risk / levels.entry > cfg.maxRiskPct) {
    fails.push(`stop distance ${fmt((levels.risk / levels.entry) * 100)}% > ${fmt(cfg.maxRiskPct * 100)}% of price`)
  }
  if (levels.riskReward < cfg.minRrRatio) fails.push(`R:R ${fmt(levels.riskReward)} < ${fmt(cfg.minRrRatio)}`)
  return fails
}

export function holdingPeriodFor(pattern: string | null | undefined): HoldingPeriod {
  return String(pattern || '').includes('VCP') ? 'Swing (2-6 Weeks)' : 'Positional (1-3 Months)'
}

// Trade metadata for a candidate, or null when the ATR stop is degenerate
export function buildTradePlan(series: Bar[], pattern: string | null | undefined, cfg: ExecutionConfig): TradePlan | null {
  const levels = tradeLevels(series, cfg)
  if (!(levels.atr > 0) || !(levels.stop < levels.entry)) return null
  return {
    entry: levels.entry,
    stop: levels.stop,
    target: levels.target,
    holdingPeriod: holdingPeriodFor(pattern),
    riskReward: levels.riskReward
  }
}

export function evaluateExecution(
  inst: Instrument,
  pattern: string | null | undefined,
  elapsedMinutes: number | null | undefined,
  cfg: ExecutionConfig
): GateResult {
  const series = Array.isArray(inst.series) ? inst.series : []
  const vol = volumeCheck(series, elapsedMinutes, cfg)
  const levels = tradeLevels(series, cfg)
  const metrics = {
    volume: vol.current,
    avg_volume: vol.average,
    session_fraction: vol.sessionFraction,
    expected_volume: vol.expected,
    entry: levels.entry,
    atr: levels.atr,
    stop: levels.stop,
    target: levels.target,
    risk_reward: levels.riskReward
  }
  const labels = { holding_period: holdingPeriodFor(pattern) }

  const fails: string[] = []
  if (!vol.ok) fails.push(`Volume ${fmt(vol.current, 0)} < prorated ${fmt(vol.expected, 0)}`)
  fails.push(...riskFailures(levels, cfg))
  if (fails.length) return gateResult('hard_fail', metrics, fails.join('; '), labels)

  return gateResult(
    'pass',
    metrics,
    `Volume ${fmt(vol.current, 0)} ≥ prorated ${fmt(vol.expected, 0)}; stop ${fmt(levels.stop)} / target ${fmt(levels.target)} (R:R ${fmt(levels.riskReward)})`,
    labels
  )
}

export function runExecutionGate(instruments: Instrument[], ctx: StageContext): StageOutput {
  const cfg = ctx.config.execution
  const results = new Map<string, GateResult>()
  for (const inst of instruments) {
    const pattern = ctx.trail[inst.ticker]?.Gate3_Technicals?.labels?.pattern
    results.set(inst.ticker, evaluateGuarded(inst.ticker, 'Gate4_Execution', () =>
      evaluateExecution(inst, pattern, ctx.batch.sessionElapsedMinutes, cfg)))
  }
  return { survivors: survivorsOf(instruments, results), results }
}
