import { ScreenerError, errorMessage } from './errors'
import { GATE_ORDER } from './types'
import type { GateName, GateOutcome, GateResult, RationaleTrail } from './types'

/**
 * Build an immutable gate result. Non-finite metrics are dropped so the trail stays
 * plain JSON.
 */
export function gateResult(
  outcome: GateOutcome,
  metrics: Record<string, number | null | undefined>,
  reason: string,
  labels?: Record<string, string>
): GateResult {
  const clean: Record<string, number> = {}
  for (const [k, v] of Object.entries(metrics)) {
    if (typeof v === 'number' && Number.isFinite(v)) clean[k] = v
  }
  const out: GateResult = { passed: outcome === 'pass', outcome, metrics: Object.freeze(clean), reason }
  if (labels && Object.keys(labels).length > 0) out.labels = Object.freeze({ ...labels })
  return Object.freeze(out)
}

export type Attempt<T> = { ok: true; value: T } | { ok: false; result: GateResult }

/**
 * Run one instrument's computation for a gate. Screener errors become a hard fail with their
 * own message; anything else becomes a generic computation error.
 */
export function attempt<T>(ticker: string, gate: GateName, body: () => T): Attempt<T> {
  try {
    return { ok: true, value: body() }
  } catch (e) {
    if (e instanceof ScreenerError && e.code !== 'compute_error') {
      return { ok: false, result: gateResult('hard_fail', {}, e.message) }
    }
    console.error('[SCREENER_COMPUTE_ERROR]', { ticker, gate, message: errorMessage(e) })
    return { ok: false, result: gateResult('hard_fail', {}, 'computation error') }
  }
}

export function evaluateGuarded(ticker: string, gate: GateName, body: () => GateResult): GateResult {
  const out = attempt(ticker, gate, body)
  return out.ok ? out.value : out.result
}

/**
 * Returns a new trail extended with one gate's results. A trail entry is never overwritten.
 */
export function appendResults(
  trail: RationaleTrail,
  gate: GateName,
  results: ReadonlyMap<string, GateResult>
): RationaleTrail {
  const next: RationaleTrail = { ...trail }
  for (const [ticker, result] of results) {
    const existing = next[ticker] || {}
    if (existing[gate]) {
      throw new Error(`[SCREENER_TRAIL] ${gate} already recorded for ${ticker}`)
    }
    next[ticker] = { ...existing, [gate]: result }
  }
  return next
}

// Gates recorded for a ticker, in the order they ran
export function gatesFor(trail: RationaleTrail, ticker: string): GateName[] {
  const entry = trail[ticker]
  if (!entry) return []
  return GATE_ORDER.filter(g => entry[g] != null)
}

export function fmt(v: number, digits = 2): string {
  return Number.isFinite(v) ? v.toFixed(digits) : String(v)
}
