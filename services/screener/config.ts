import fs from 'node:fs'
import path from 'node:path'
import dotenv from 'dotenv'
import Ajv from 'ajv'
import configSchemaJson from '../../schemas/screener_config.schema.json'
import { ConfigError, errorMessage } from './errors'
import type { ScreenerConfig, ScreenerConfigInput } from './types'

let cachedConfig: ScreenerConfig | null = null

export const DEFAULT_CONFIG: Omit<ScreenerConfig, 'institutional'> = {
  spread: {
    maxSpreadZScore: 2.0,
    maxAbsSpread: 0.5,
    rollingWindow: 20
  },
  fundamentals: {
    minFScore: 4,
    minCfoPat: 0.5,
    maxPromoterPledge: 5.0
  },
  technicals: {
    minAdx: 10,
    adxPeriod: 14,
    minMansfieldSlope: 0.01,
    maShort: 50,
    maMid: 150,
    maLong: 200,
    maLongTrendSessions: 20,
    rsLookbackWeeks: 52,
    rsSlopeSessions: 10,
    vcpSegmentBars: 10,
    vcpMaxFinalRangePct: 0.10
  },
  execution: {
    volProrateFactor: 0.85,
    minRrRatio: 2.0,
    atrPeriod: 14,
    atrStopMultiplier: 2.0,
    rewardMultiple: 2.0,
    maxRiskPct: 0.25,
    volAvgDays: 20,
    marketOpenMinutes: 375 // 9:15 -> 15:30
  }
}

const ajv = new Ajv({ allErrors: true, strict: false })
const validate = ajv.compile<ScreenerConfig>(configSchemaJson)

let envLoaded = false

function loadEnvFiles(): void {
  if (envLoaded) return
  envLoaded = true
  const tryLoad = (p: string) => { if (fs.existsSync(p)) dotenv.config({ path: p }) }
  tryLoad(path.resolve(process.cwd(), '.env.local'))
  tryLoad(path.resolve(process.cwd(), '.env'))
}

/**
 * Merge caller overrides over the code defaults and validate the result.
 * The institutional tier table has no default and must be supplied.
 */
export function resolveConfig(input: ScreenerConfigInput): ScreenerConfig {
  const merged: ScreenerConfig = {
    spread: { ...DEFAULT_CONFIG.spread, ...input.spread },
    fundamentals: { ...DEFAULT_CONFIG.fundamentals, ...input.fundamentals },
    institutional: { tiers: { ...input.institutional.tiers } },
    technicals: { ...DEFAULT_CONFIG.technicals, ...input.technicals },
    execution: { ...DEFAULT_CONFIG.execution, ...input.execution }
  }
  if (!validate(merged)) {
    const errors = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message || 'invalid'}`)
    throw new ConfigError('Invalid screener config', errors)
  }
  const { maShort, maMid, maLong } = merged.technicals
  if (!(maShort < maMid && maMid < maLong)) {
    throw new ConfigError('Invalid screener config', [`moving averages must satisfy maShort < maMid < maLong (got ${maShort}/${maMid}/${maLong})`])
  }
  return merged
}

export function configPath(): string {
  loadEnvFiles()
  const override = String(process.env.SCREENER_CONFIG_PATH || '').trim()
  return path.resolve(process.cwd(), override || 'config/screener.json')
}

export function loadConfig(): ScreenerConfig {
  if (cachedConfig) return cachedConfig

  const file = configPath()
  // STRICT: the tier table lives only in the policy file
  if (!fs.existsSync(file)) {
    throw new ConfigError(`[SCREENER_CONFIG] Config file not found: ${file}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (e) {
    console.error('[SCREENER_CONFIG_ERROR]', { message: errorMessage(e), path: file })
    throw new ConfigError(`Failed to read screener config: ${errorMessage(e)}`)
  }
  if (!isConfigInput(parsed)) {
    throw new ConfigError('Invalid screener config', ['institutional.tiers is required'])
  }

  cachedConfig = resolveConfig(parsed)
  console.log('[SCREENER_CONFIG_LOADED]', { path: file })
  return cachedConfig
}

export function reloadConfig(): ScreenerConfig {
  cachedConfig = null
  return loadConfig()
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

// Shape check only; resolveConfig runs the full schema over the merged result
function isConfigInput(v: unknown): v is ScreenerConfigInput {
  return isRecord(v) && isRecord(v.institutional) && isRecord(v.institutional.tiers)
}
