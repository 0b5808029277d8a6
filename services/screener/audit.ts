// Scan audit record: summary counts + the verbatim rationale trail.
// Persisting the record is the caller's job; this module only builds and validates it.

import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import { ulid } from 'ulid'
import auditSchemaJson from '../../schemas/scan_audit.schema.json'
import { resolveCapTier } from './gates/institutional'
import type { CapTier, GateName, RationaleTrail, ScanAuditRecord, ScanResult, ScanSummary } from './types'

const ajv = new Ajv({ allErrors: true, strict: false })
addFormats(ajv)
const validate = ajv.compile<ScanAuditRecord>(auditSchemaJson)

function countWhere(trail: RationaleTrail, gate: GateName, pred: (passed: boolean, outcome: string) => boolean): number {
  let n = 0
  for (const entry of Object.values(trail)) {
    const r = entry[gate]
    if (r && pred(r.passed, r.outcome)) n++
  }
  return n
}

export function summarizeScan(result: Pick<ScanResult, 'rationale'>): ScanSummary {
  const trail = result.rationale
  const passed = (gate: GateName) => countWhere(trail, gate, p => p)
  return {
    total_scanned: Object.keys(trail).length,
    passed_g1: passed('Gate1_Spread'),
    passed_g2: passed('Gate2_Fundamentals'),
    passed_g2b: passed('Gate2B_Institutional'),
    passed_g3: passed('Gate3_Technicals'),
    coiling_springs: countWhere(trail, 'Gate3_Technicals', (_, outcome) => outcome === 'soft_fail'),
    passed_all: passed('Gate4_Execution')
  }
}

export function buildAuditRecord(
  result: ScanResult,
  opts: { now?: Date; sessionId?: string } = {}
): ScanAuditRecord {
  const now = opts.now || new Date()
  const record: ScanAuditRecord = {
    timestamp: now.toISOString(),
    session_id: opts.sessionId || ulid(now.getTime()),
    total_scanned: Object.keys(result.rationale).length,
    candidates_count: result.candidates.length,
    candidates: result.candidates.map(c => c.ticker),
    summary: summarizeScan(result),
    // detached copy; the record may outlive the scan
    rationale: structuredClone(result.rationale)
  }
  validateAuditRecord(record)
  return record
}

/**
 * Validate against schemas/scan_audit.schema.json.
 * Throws error if validation fails
 */
export function validateAuditRecord(record: unknown): asserts record is ScanAuditRecord {
  if (!validate(record)) {
    const errors = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message || 'invalid'}`)
    throw new Error(`[SCAN_AUDIT_INVALID] ${errors.join('; ')}`)
  }
}

// e.g. RAT-RELIANCE-LARGE-2026
export function rationaleId(ticker: string, capTier: CapTier | string | null | undefined, year: number): string {
  const base = String(ticker || '').split('.')[0].toUpperCase()
  return `RAT-${base}-${resolveCapTier(capTier)}-${year}`
}
