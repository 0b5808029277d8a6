import type { ScanResult, WatchlistEntry, WeeklyWatchlistEntry } from './types'

export type DailyWatchlist = {
  date: string // YYYYMMDD
  entries: WatchlistEntry[]
}

export type AggregateOptions = {
  now: Date
  lookbackDays?: number
  minOccurrences?: number
}

const DAY_MS = 24 * 60 * 60 * 1000

// Coiling springs of one scan, enriched from the trail
export function buildWatchlist(result: ScanResult): WatchlistEntry[] {
  return result.candidates
    .filter(c => c.status === 'COILING_SPRING')
    .map(c => {
      const entry = result.rationale[c.ticker] || {}
      return {
        ticker: c.ticker,
        close: entry.Gate3_Technicals?.metrics.close ?? 0,
        sector: c.sector,
        reason: entry.Gate3_Technicals?.reason || c.reason,
        f_score: entry.Gate2_Fundamentals?.metrics.f_score ?? 0,
        mrs: entry.Gate3_Technicals?.metrics.mrs ?? 0,
        market_cap: c.capTier,
        inst_ownership: entry.Gate2B_Institutional?.metrics.inst_ownership ?? 0
      }
    })
}

// UTC midnight of a YYYYMMDD stamp, or null when malformed
export function parseWatchlistDate(stamp: string): number | null {
  const m = /^(\d{4})(\d{2})(\d{2})$/.exec(String(stamp || ''))
  if (!m) return null
  const y = Number(m[1])
  const mo = Number(m[2])
  const d = Number(m[3])
  const ts = Date.UTC(y, mo - 1, d)
  const check = new Date(ts)
  if (check.getUTCFullYear() !== y || check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d) return null
  return ts
}

/**
 * Tickers that sat on the daily watchlist at least `minOccurrences` times within the lookback
 * window. Each ticker keeps its most recent entry. Sorted by days on list, then ticker.
 */
export function aggregateWatchlists(daily: DailyWatchlist[], opts: AggregateOptions): WeeklyWatchlistEntry[] {
  const lookbackDays = opts.lookbackDays ?? 7
  const minOccurrences = opts.minOccurrences ?? 3
  const cutoff = opts.now.getTime() - lookbackDays * DAY_MS

  const relevant = daily
    .map(d => ({ ts: parseWatchlistDate(d.date), entries: d.entries }))
    .filter((d): d is { ts: number; entries: WatchlistEntry[] } => d.ts != null && d.ts >= cutoff)
    .sort((a, b) => a.ts - b.ts)

  if (!relevant.length) {
    console.warn('[WATCHLIST_AGGREGATE_EMPTY]', { lookbackDays })
    return []
  }

  const counts = new Map<string, number>()
  const latest = new Map<string, WatchlistEntry>()
  for (const day of relevant) {
    const seenToday = new Set<string>()
    for (const item of day.entries) {
      if (seenToday.has(item.ticker)) continue
      seenToday.add(item.ticker)
      counts.set(item.ticker, (counts.get(item.ticker) || 0) + 1)
      latest.set(item.ticker, item)
    }
  }

  const out: WeeklyWatchlistEntry[] = []
  for (const [ticker, days] of counts) {
    const item = latest.get(ticker)
    if (item && days >= minOccurrences) out.push({ ...item, days_on_watchlist: days })
  }
  out.sort((a, b) => b.days_on_watchlist - a.days_on_watchlist || a.ticker.localeCompare(b.ticker))
  console.info('[WATCHLIST_AGGREGATED]', { files: relevant.length, sustained: out.length })
  return out
}
