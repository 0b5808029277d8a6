// Shared indicator implementations used by the screener gates.
// All functions are deterministic, side-effect free, and return null when inputs are insufficient.

export function mean(values: number[]): number | null {
  if (!Array.isArray(values) || values.length === 0) return null
  let sum = 0
  for (const v of values) sum += v
  const out = sum / values.length
  return Number.isFinite(out) ? out : null
}

export function stdDev(values: number[], sample = true): number | null {
  const n = Array.isArray(values) ? values.length : 0
  if (n === 0 || (sample && n < 2)) return null
  const m = mean(values)
  if (m == null) return null
  let sq = 0
  for (const v of values) sq += (v - m) * (v - m)
  const out = Math.sqrt(sq / (sample ? n - 1 : n))
  return Number.isFinite(out) ? out : null
}

// Simple moving average of the `period` values ending at `endIndex` (inclusive, defaults to last)
export function sma(values: number[], period: number, endIndex = values.length - 1): number | null {
  if (!Array.isArray(values) || period <= 0) return null
  if (endIndex >= values.length || endIndex - period + 1 < 0) return null
  let sum = 0
  for (let i = endIndex - period + 1; i <= endIndex; i++) sum += values[i]
  const out = sum / period
  return Number.isFinite(out) ? out : null
}

export function atr(high: number[], low: number[], close: number[], period = 14): number | null {
  if (!Array.isArray(high) || !Array.isArray(low) || !Array.isArray(close)) return null
  if (high.length !== low.length || low.length !== close.length) return null
  const n = high.length
  if (n < period + 1) return null
  const tr: number[] = []
  for (let i = 1; i < n; i++) {
    const hl = high[i] - low[i]
    const hc = Math.abs(high[i] - close[i - 1])
    const lc = Math.abs(low[i] - close[i - 1])
    tr.push(Math.max(hl, hc, lc))
  }
  // Wilder smoothing
  let atrVal = tr.slice(0, period).reduce((a, b) => a + b, 0) / period
  for (let i = period; i < tr.length; i++) atrVal = (atrVal * (period - 1) + tr[i]) / period
  return Number.isFinite(atrVal) ? atrVal : null
}

// Wilder's Average Directional Index. Needs 2 * period + 1 bars.
export function adx(high: number[], low: number[], close: number[], period = 14): number | null {
  if (!Array.isArray(high) || !Array.isArray(low) || !Array.isArray(close)) return null
  if (high.length !== low.length || low.length !== close.length) return null
  const n = high.length
  if (period <= 0 || n < 2 * period + 1) return null

  const tr: number[] = []
  const plusDm: number[] = []
  const minusDm: number[] = []
  for (let i = 1; i < n; i++) {
    const up = high[i] - high[i - 1]
    const down = low[i - 1] - low[i]
    plusDm.push(up > down && up > 0 ? up : 0)
    minusDm.push(down > up && down > 0 ? down : 0)
    tr.push(Math.max(high[i] - low[i], Math.abs(high[i] - close[i - 1]), Math.abs(low[i] - close[i - 1])))
  }

  const dxAt = (smTr: number, smPlus: number, smMinus: number): number => {
    if (!(smTr > 0)) return 0
    const pdi = (100 * smPlus) / smTr
    const mdi = (100 * smMinus) / smTr
    const sum = pdi + mdi
    return sum > 0 ? (100 * Math.abs(pdi - mdi)) / sum : 0
  }

  let smTr = 0
  let smPlus = 0
  let smMinus = 0
  for (let i = 0; i < period; i++) {
    smTr += tr[i]
    smPlus += plusDm[i]
    smMinus += minusDm[i]
  }
  const dx: number[] = [dxAt(smTr, smPlus, smMinus)]
  for (let i = period; i < tr.length; i++) {
    smTr = smTr - smTr / period + tr[i]
    smPlus = smPlus - smPlus / period + plusDm[i]
    smMinus = smMinus - smMinus / period + minusDm[i]
    dx.push(dxAt(smTr, smPlus, smMinus))
  }

  let adxVal = dx.slice(0, period).reduce((a, b) => a + b, 0) / period
  for (let i = period; i < dx.length; i++) adxVal = (adxVal * (period - 1) + dx[i]) / period
  return Number.isFinite(adxVal) ? adxVal : null
}

// Mansfield relative strength: relative price against the benchmark, rebased on its own SMA.
// Inputs must be date-aligned. Output[k] corresponds to input index k + lookback - 1.
export function mansfieldRs(closes: number[], benchmark: number[], lookback: number): number[] | null {
  if (!Array.isArray(closes) || !Array.isArray(benchmark)) return null
  if (closes.length !== benchmark.length || lookback <= 0 || closes.length < lookback) return null
  const rp: number[] = []
  for (let i = 0; i < closes.length; i++) {
    if (!(benchmark[i] > 0) || !Number.isFinite(closes[i])) return null
    rp.push(closes[i] / benchmark[i])
  }
  const out: number[] = []
  let windowSum = 0
  for (let i = 0; i < rp.length; i++) {
    windowSum += rp[i]
    if (i >= lookback) windowSum -= rp[i - lookback]
    if (i >= lookback - 1) {
      const base = windowSum / lookback
      out.push((rp[i] / base - 1) * 100)
    }
  }
  return out
}

// Least-squares slope against x = 0..n-1
export function linearSlope(values: number[]): number | null {
  const n = Array.isArray(values) ? values.length : 0
  if (n < 2) return null
  const xMean = (n - 1) / 2
  const yMean = mean(values)
  if (yMean == null) return null
  let num = 0
  let den = 0
  for (let i = 0; i < n; i++) {
    num += (i - xMean) * (values[i] - yMean)
    den += (i - xMean) * (i - xMean)
  }
  const out = num / den
  return Number.isFinite(out) ? out : null
}
