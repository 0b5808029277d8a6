import { resolveConfig } from '../config'
import type { Batch, Bar, CapTier, Fundamentals, Instrument, ScreenerConfig, ScreenerConfigInput, TierThreshold } from '../types'

export const TEST_TIERS: Record<CapTier, TierThreshold> = {
  LARGE: { minInstitutionalPct: 10, minFreeFloatPct: 15 },
  MID: { minInstitutionalPct: 15, minFreeFloatPct: 20 },
  SMALL: { minInstitutionalPct: 20, minFreeFloatPct: 25 }
}

export function testConfig(overrides: Omit<ScreenerConfigInput, 'institutional'> = {}): ScreenerConfig {
  return resolveConfig({ ...overrides, institutional: { tiers: TEST_TIERS } })
}

const DAY_MS = 24 * 60 * 60 * 1000

export function dateAt(i: number, start = '2025-01-01'): string {
  return new Date(Date.parse(`${start}T00:00:00Z`) + i * DAY_MS).toISOString().slice(0, 10)
}

// Bars around each close with a symmetric range of +/- rangePct
export function barsFromCloses(closes: number[], opts: { rangePct?: number; volume?: number; start?: string } = {}): Bar[] {
  const r = opts.rangePct ?? 0.01
  return closes.map((c, i) => ({
    date: dateAt(i, opts.start),
    open: c,
    high: c * (1 + r),
    low: c * (1 - r),
    close: c,
    volume: opts.volume ?? 1000
  }))
}

// Close fixed at 100 with (high - low) / close == spread
export function spreadSeries(n: number, spread: number): Bar[] {
  return Array.from({ length: n }, (_, i) => ({
    date: dateAt(i),
    open: 100,
    high: 100 + spread * 50,
    low: 100 - spread * 50,
    close: 100,
    volume: 1000
  }))
}

export function flatCloses(n: number, price = 100): number[] {
  return Array.from({ length: n }, () => price)
}

// Slow uptrend that accelerates over the last 30 sessions
export function acceleratingCloses(n = 300): number[] {
  const out: number[] = []
  let c = 100
  for (let i = 0; i < n; i++) {
    if (i > 0) c = c * (i >= n - 30 ? 1.01 : 1.002)
    out.push(c)
  }
  return out
}

export function strongFundamentals(): Fundamentals {
  return {
    current: {
      netIncome: 100, cfo: 150, totalAssets: 1000, currentAssets: 500, currentLiabilities: 250,
      longTermDebt: 100, sharesOutstanding: 1000, revenue: 2000, grossProfit: 800
    },
    prior: {
      netIncome: 80, cfo: 100, totalAssets: 1000, currentAssets: 400, currentLiabilities: 250,
      longTermDebt: 150, sharesOutstanding: 1000, revenue: 1800, grossProfit: 650
    },
    promoterPledgePct: 0
  }
}

// Exactly four signals (roa_positive, cfo_positive, roa_improving, no_dilution),
// CFO/PAT 0.5, pledge 5.0
export function boundaryFundamentals(): Fundamentals {
  return {
    current: {
      netIncome: 100, cfo: 50, totalAssets: 1000, currentAssets: 400, currentLiabilities: 250,
      longTermDebt: 150, sharesOutstanding: 1000, revenue: 1800, grossProfit: 650
    },
    prior: {
      netIncome: 80, cfo: 60, totalAssets: 1000, currentAssets: 500, currentLiabilities: 250,
      longTermDebt: 100, sharesOutstanding: 1000, revenue: 2000, grossProfit: 800
    },
    promoterPledgePct: 5.0
  }
}

export function makeInstrument(overrides: Partial<Instrument> = {}): Instrument {
  return {
    ticker: 'TEST.NS',
    series: barsFromCloses(acceleratingCloses()),
    sector: 'Unknown',
    capTier: 'LARGE',
    fundamentals: strongFundamentals(),
    institutional: { institutionalOwnershipPct: 30, freeFloatPct: 40 },
    ...overrides
  }
}

export function flatBenchmark(n = 300): Bar[] {
  return barsFromCloses(flatCloses(n), { volume: 1_000_000 })
}

/**
 * One instrument stopping at each stage:
 * A buys, B short history (G1), C no fundamentals (G2), D thin holdings (G2B),
 * E flat tape (G3 reject), F no overlap with the benchmark (G3 coiling spring).
 */
export function mixedBatch(): Batch {
  const accelerating = barsFromCloses(acceleratingCloses())
  return {
    benchmark: flatBenchmark(),
    instruments: [
      makeInstrument({ ticker: 'A', series: accelerating }),
      makeInstrument({ ticker: 'B', series: accelerating.slice(-5) }),
      makeInstrument({ ticker: 'C', series: accelerating, fundamentals: null }),
      makeInstrument({ ticker: 'D', series: accelerating, institutional: { institutionalOwnershipPct: 1, freeFloatPct: 1 } }),
      makeInstrument({ ticker: 'E', series: barsFromCloses(flatCloses(300)) }),
      makeInstrument({ ticker: 'F', series: barsFromCloses(acceleratingCloses(), { start: '2030-01-01' }) })
    ]
  }
}
