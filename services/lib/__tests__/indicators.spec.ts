import { adx, atr, linearSlope, mansfieldRs, mean, sma, stdDev } from '../indicators'

describe('indicators', () => {
  it('mean and stdDev', () => {
    const xs = [2, 4, 4, 4, 5, 5, 7, 9]
    expect(mean(xs)).toBe(5)
    expect(mean([])).toBeNull()
    expect(stdDev(xs, false)).toBe(2)
    expect(stdDev(xs)).toBeCloseTo(Math.sqrt(32 / 7), 12)
    expect(stdDev([5])).toBeNull()
  })

  it('sma over the trailing window or one ending earlier', () => {
    const xs = [1, 2, 3, 4, 5]
    expect(sma(xs, 3)).toBe(4)
    expect(sma(xs, 3, 2)).toBe(2)
    expect(sma(xs, 6)).toBeNull()
  })

  it('atr of a constant range equals the range', () => {
    const n = 15
    const high = Array.from({ length: n }, () => 101)
    const low = Array.from({ length: n }, () => 99)
    const close = Array.from({ length: n }, () => 100)
    expect(atr(high, low, close, 14)).toBe(2)
    expect(atr(high.slice(1), low.slice(1), close.slice(1), 14)).toBeNull()
  })

  it('adx is 100 in a one-way market and 0 in a dead one', () => {
    const closes = Array.from({ length: 40 }, (_, i) => 100 + i)
    const high = closes.map(c => c * 1.01)
    const low = closes.map(c => c * 0.99)
    expect(adx(high, low, closes, 14)).toBeCloseTo(100, 6)

    const flat = Array.from({ length: 40 }, () => 100)
    expect(adx(flat, flat, flat, 14)).toBe(0)
  })

  it('adx needs 2 * period + 1 bars', () => {
    const xs = Array.from({ length: 28 }, (_, i) => 100 + i)
    expect(adx(xs, xs, xs, 14)).toBeNull()
  })

  it('linearSlope', () => {
    expect(linearSlope([1, 3, 5])).toBe(2)
    expect(linearSlope([4])).toBeNull()
  })

  it('mansfieldRs is flat zero when the ratio to the benchmark never changes', () => {
    expect(mansfieldRs([2, 4, 6, 8], [1, 2, 3, 4], 2)).toEqual([0, 0, 0])
    expect(mansfieldRs([1, 2], [1], 1)).toBeNull()
    expect(mansfieldRs([1, 2], [1, 0], 1)).toBeNull()
  })
})
