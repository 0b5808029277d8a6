// Gate 1 - Sector-adjusted spread quality
// Pass 1 computes each instrument's rolling (H-L)/C, the sector table is reduced once,
// then pass 2 scores every instrument against its (read-only) sector row.

import { mean, stdDev } from '../../lib/indicators'
import { ComputeError, DegenerateGroupError, InsufficientHistoryError } from '../errors'
import { attempt, evaluateGuarded, fmt, gateResult } from '../rationale'
import { survivorsOf } from '../stage'
import type { StageContext, StageOutput } from '../stage'
import type { Bar, GateResult, Instrument, SpreadConfig } from '../types'

export const UNSECTORED = 'Unknown'

const MIN_STD = 1e-12

export type SectorStats = {
  count: number
  mean: number
  std: number | null // null when fewer than 2 members
}

export type SectorTable = ReadonlyMap<string, Readonly<SectorStats>>

export function sectorKey(sector: string | null | undefined): string {
  const s = String(sector ?? '').trim()
  if (!s || s.toLowerCase() === 'unknown') return UNSECTORED
  return s
}

export function rollingSpread(series: Bar[], window: number): number {
  const bars = Array.isArray(series) ? series : []
  if (bars.length < window) throw new InsufficientHistoryError(window, bars.length)
  const ratios: number[] = []
  for (const b of bars.slice(-window)) {
    if (!(b.close > 0)) throw new ComputeError(`non-positive close on ${b.date}`)
    ratios.push((b.high - b.low) / b.close)
  }
  const out = mean(ratios)
  if (out == null) throw new ComputeError('spread is not finite')
  return out
}

export function buildSectorTable(rows: Array<{ sector: string; spread: number }>): SectorTable {
  const grouped = new Map<string, number[]>()
  for (const r of rows) {
    const list = grouped.get(r.sector)
    if (list) list.push(r.spread)
    else grouped.set(r.sector, [r.spread])
  }
  const table = new Map<string, Readonly<SectorStats>>()
  for (const [sector, spreads] of grouped) {
    table.set(sector, Object.freeze({
      count: spreads.length,
      mean: mean(spreads) ?? 0,
      std: stdDev(spreads)
    }))
  }
  return table
}

/**
 * Sector row usable for a z-test. Throws DegenerateGroupError for the unsectored group,
 * single-member sectors and zero-dispersion sectors.
 */
export function sectorStatsFor(table: SectorTable, sector: string): { count: number; mean: number; std: number } {
  if (sector === UNSECTORED) throw new DegenerateGroupError(sector, 'unsectored group')
  const row = table.get(sector)
  if (!row || row.count < 2 || row.std == null) {
    throw new DegenerateGroupError(sector, `sector "${sector}" has ${row?.count ?? 0} member${row?.count === 1 ? '' : 's'}`)
  }
  if (row.std < MIN_STD) throw new DegenerateGroupError(sector, `zero dispersion in sector "${sector}"`)
  return { count: row.count, mean: row.mean, std: row.std }
}

export function evaluateSpread(spread: number, sector: string, table: SectorTable, cfg: SpreadConfig): GateResult {
  const capOk = spread < cfg.maxAbsSpread
  const capFail = `Spread ${fmt(spread, 4)} at or above absolute cap ${fmt(cfg.maxAbsSpread)}`
  const row = table.get(sector)
  const metrics: Record<string, number | null> = {
    spread,
    sector_mean: row?.mean ?? null,
    sector_std: row?.std ?? null,
    sector_count: row?.count ?? 0
  }
  const labels = { sector }

  let stats: { mean: number; std: number }
  try {
    stats = sectorStatsFor(table, sector)
  } catch (e) {
    if (!(e instanceof DegenerateGroupError)) throw e
    const reason = capOk
      ? `Spread ${fmt(spread, 4)} below cap ${fmt(cfg.maxAbsSpread)}; ${e.message}`
      : `${capFail}; ${e.message}`
    return gateResult(capOk ? 'pass' : 'hard_fail', metrics, reason, labels)
  }

  const z = (spread - stats.mean) / stats.std
  metrics.spread_z = z
  const zOk = z <= cfg.maxSpreadZScore
  if (zOk && capOk) {
    return gateResult('pass', metrics, `Spread ${fmt(spread, 4)} within sector norm (z=${fmt(z)} ≤ ${fmt(cfg.maxSpreadZScore)})`, labels)
  }
  const fails: string[] = []
  if (!zOk) fails.push(`Spread z-score ${fmt(z)} > ${fmt(cfg.maxSpreadZScore)} vs sector "${sector}"`)
  if (!capOk) fails.push(capFail)
  return gateResult('hard_fail', metrics, fails.join('; '), labels)
}

export function runSpreadGate(instruments: Instrument[], ctx: StageContext): StageOutput {
  const cfg = ctx.config.spread
  const results = new Map<string, GateResult>()

  // Pass 1: per-instrument spread
  const spreads = new Map<string, { sector: string; spread: number }>()
  const failures = new Map<string, GateResult>()
  for (const inst of instruments) {
    const sector = sectorKey(inst.sector)
    const out = attempt(inst.ticker, 'Gate1_Spread', () => rollingSpread(inst.series, cfg.rollingWindow))
    if (out.ok) spreads.set(inst.ticker, { sector, spread: out.value })
    else failures.set(inst.ticker, out.result)
  }

  // Barrier: sector table is built once, then only read
  const table = buildSectorTable([...spreads.values()])

  // Pass 2: z-test against the sector row
  for (const inst of instruments) {
    const row = spreads.get(inst.ticker)
    const failed = failures.get(inst.ticker)
    if (failed) results.set(inst.ticker, failed)
    else if (row) results.set(inst.ticker, evaluateGuarded(inst.ticker, 'Gate1_Spread', () => evaluateSpread(row.spread, row.sector, table, cfg)))
  }

  return { survivors: survivorsOf(instruments, results), results }
}
