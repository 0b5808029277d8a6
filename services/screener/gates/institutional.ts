// Gate 2B - Institutional ownership & free float, thresholds per market-cap tier

import { fmt, evaluateGuarded, gateResult } from '../rationale'
import { survivorsOf } from '../stage'
import type { StageContext, StageOutput } from '../stage'
import { CAP_TIERS } from '../types'
import type { CapTier, GateResult, Instrument, InstitutionalConfig } from '../types'

// Unresolved tiers fall back to the strictest table row
export const DEFAULT_CAP_TIER: CapTier = 'SMALL'

export function resolveCapTier(tier: string | null | undefined): CapTier {
  const t = String(tier ?? '').trim().toUpperCase()
  return CAP_TIERS.find(c => c === t) ?? DEFAULT_CAP_TIER
}

function pct(v: number | null | undefined): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null
}

export function evaluateInstitutional(inst: Instrument, cfg: InstitutionalConfig): GateResult {
  const tier = resolveCapTier(inst.capTier)
  const threshold = cfg.tiers[tier]
  const own = pct(inst.institutional?.institutionalOwnershipPct)
  const float = pct(inst.institutional?.freeFloatPct)

  const metrics = {
    inst_ownership: own,
    free_float: float,
    min_inst_ownership: threshold.minInstitutionalPct,
    min_free_float: threshold.minFreeFloatPct
  }
  const labels = { cap_tier: tier }

  const fails: string[] = []
  if (own == null) fails.push('Institutional ownership undisclosed')
  else if (own < threshold.minInstitutionalPct) fails.push(`Inst. ownership ${fmt(own)}% < ${fmt(threshold.minInstitutionalPct)}% (${tier})`)
  if (float == null) fails.push('Free float undisclosed')
  else if (float < threshold.minFreeFloatPct) fails.push(`Free float ${fmt(float)}% < ${fmt(threshold.minFreeFloatPct)}% (${tier})`)

  if (fails.length) return gateResult('hard_fail', metrics, fails.join('; '), labels)
  return gateResult('pass', metrics, `Inst. ownership ${fmt(own ?? 0)}%, free float ${fmt(float ?? 0)}% meet ${tier} thresholds`, labels)
}

export function runInstitutionalGate(instruments: Instrument[], ctx: StageContext): StageOutput {
  const cfg = ctx.config.institutional
  const results = new Map<string, GateResult>()
  for (const inst of instruments) {
    results.set(inst.ticker, evaluateGuarded(inst.ticker, 'Gate2B_Institutional', () => evaluateInstitutional(inst, cfg)))
  }
  return { survivors: survivorsOf(instruments, results), results }
}
