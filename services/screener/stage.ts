import type { Batch, GateName, GateResult, Instrument, RationaleTrail, ScreenerConfig } from './types'

export type StageContext = {
  batch: Batch
  config: ScreenerConfig
  // trail as it stood before this stage ran (read-only)
  trail: RationaleTrail
}

export type StageOutput = {
  survivors: Instrument[]
  results: Map<string, GateResult>
}

// A gate stage: (survivors, batch) -> (new survivors, per-instrument results)
export type GateStage = {
  gate: GateName
  run: (survivors: Instrument[], ctx: StageContext) => StageOutput
}

export function survivorsOf(input: Instrument[], results: ReadonlyMap<string, GateResult>): Instrument[] {
  return input.filter(i => results.get(i.ticker)?.passed === true)
}
