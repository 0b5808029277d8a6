import { parseBatch } from '../batch'
import { BatchError } from '../errors'
import { flatBenchmark, makeInstrument } from './helpers'

describe('batch parsing', () => {
  it('accepts a well-formed batch as is', () => {
    const raw = { instruments: [makeInstrument({ ticker: 'A' })], benchmark: flatBenchmark(10), sessionElapsedMinutes: 120 }
    expect(parseBatch(raw)).toBe(raw)
  })

  it('accepts short series and absent metadata', () => {
    const raw = { instruments: [{ ticker: 'A', series: [] }] }
    expect(parseBatch(raw)).toBe(raw)
  })

  it('rejects structural problems', () => {
    expect(() => parseBatch({})).toThrow(BatchError)
    expect(() => parseBatch({})).toThrow("Invalid batch: / must have required property 'instruments'")
    expect(() => parseBatch({ instruments: [{ ticker: 'A', series: [{ date: '2025-01-01' }] }] }))
      .toThrow("/instruments/0/series/0 must have required property 'open'")
    expect(() => parseBatch({ instruments: [{ ticker: 'A', series: [], capTier: 'MEGA' }] }))
      .toThrow('/instruments/0/capTier must be equal to one of the allowed values')
  })
})
