// Equity Screener - Type Definitions
// Daily end-of-day gate pipeline

export type CapTier = 'LARGE' | 'MID' | 'SMALL'

export const CAP_TIERS: readonly CapTier[] = ['LARGE', 'MID', 'SMALL']

export type Bar = {
  date: string // YYYY-MM-DD, chronological
  open: number
  high: number
  low: number
  close: number
  volume: number
}

// One fiscal year of disclosed line items; any of them may be missing
export type FinancialYear = {
  netIncome?: number | null
  cfo?: number | null
  totalAssets?: number | null
  currentAssets?: number | null
  currentLiabilities?: number | null
  longTermDebt?: number | null
  sharesOutstanding?: number | null
  revenue?: number | null
  grossProfit?: number | null
}

export type Fundamentals = {
  current?: FinancialYear | null
  prior?: FinancialYear | null
  promoterPledgePct?: number | null
}

export type InstitutionalSnapshot = {
  institutionalOwnershipPct?: number | null
  freeFloatPct?: number | null
}

export type Instrument = {
  ticker: string
  name?: string
  series: Bar[]
  sector?: string | null // "Unknown" and missing both mean unsectored
  capTier?: CapTier | null
  fundamentals?: Fundamentals | null
  institutional?: InstitutionalSnapshot | null
}

export type Batch = {
  instruments: Instrument[]
  benchmark?: Bar[] | null
  // minutes elapsed in the current session; absent = last bar is a completed session
  sessionElapsedMinutes?: number | null
}

export type GateName =
  | 'Gate1_Spread'
  | 'Gate2_Fundamentals'
  | 'Gate2B_Institutional'
  | 'Gate3_Technicals'
  | 'Gate4_Execution'

export const GATE_ORDER: readonly GateName[] = [
  'Gate1_Spread',
  'Gate2_Fundamentals',
  'Gate2B_Institutional',
  'Gate3_Technicals',
  'Gate4_Execution'
]

export type GateOutcome = 'pass' | 'soft_fail' | 'hard_fail'

export type GateResult = {
  passed: boolean
  outcome: GateOutcome
  metrics: Record<string, number>
  reason: string
  labels?: Record<string, string>
}

export type RationaleTrail = Record<string, Partial<Record<GateName, GateResult>>>

export type CandidateStatus = 'BUY' | 'COILING_SPRING'

export type HoldingPeriod = 'Swing (2-6 Weeks)' | 'Positional (1-3 Months)'

export type TradePlan = {
  entry: number
  stop: number
  target: number
  holdingPeriod: HoldingPeriod
  riskReward: number
}

export type Candidate = {
  ticker: string
  status: CandidateStatus
  sector: string
  capTier: CapTier
  pattern: string
  reason: string
  metrics: Record<string, number>
  trade: TradePlan | null
}

export type PipelineState = 'INIT' | 'G1' | 'G2' | 'G2B' | 'G3' | 'G4' | 'DONE'

export type ScanResult = {
  candidates: Candidate[]
  rationale: RationaleTrail
  // trade levels for every Gate 2B survivor; null when the ATR stop is degenerate
  trades: Record<string, TradePlan | null>
  // states visited in order, ending with DONE
  states: PipelineState[]
}

export type ScanSummary = {
  total_scanned: number
  passed_g1: number
  passed_g2: number
  passed_g2b: number
  passed_g3: number
  coiling_springs: number
  passed_all: number
}

export type TierThreshold = {
  minInstitutionalPct: number
  minFreeFloatPct: number
}

export type SpreadConfig = {
  maxSpreadZScore: number
  maxAbsSpread: number
  rollingWindow: number
}

export type FundamentalsConfig = {
  minFScore: number
  minCfoPat: number
  maxPromoterPledge: number
}

export type InstitutionalConfig = {
  tiers: Record<CapTier, TierThreshold>
}

export type TechnicalsConfig = {
  minAdx: number
  adxPeriod: number
  minMansfieldSlope: number
  maShort: number
  maMid: number
  maLong: number
  maLongTrendSessions: number
  rsLookbackWeeks: number
  rsSlopeSessions: number
  vcpSegmentBars: number
  vcpMaxFinalRangePct: number
}

export type ExecutionConfig = {
  volProrateFactor: number
  minRrRatio: number
  atrPeriod: number
  atrStopMultiplier: number
  rewardMultiple: number
  maxRiskPct: number
  volAvgDays: number
  marketOpenMinutes: number
}

export type ScreenerConfig = {
  spread: SpreadConfig
  fundamentals: FundamentalsConfig
  institutional: InstitutionalConfig
  technicals: TechnicalsConfig
  execution: ExecutionConfig
}

// Tier table has no code default; it always comes from the policy file or the caller
export type ScreenerConfigInput = {
  spread?: Partial<SpreadConfig>
  fundamentals?: Partial<FundamentalsConfig>
  institutional: InstitutionalConfig
  technicals?: Partial<TechnicalsConfig>
  execution?: Partial<ExecutionConfig>
}

export type WatchlistEntry = {
  ticker: string
  close: number
  sector: string
  reason: string
  f_score: number
  mrs: number
  market_cap: CapTier
  inst_ownership: number
}

export type WeeklyWatchlistEntry = WatchlistEntry & {
  days_on_watchlist: number
}

export type ScanAuditRecord = {
  timestamp: string
  session_id: string
  total_scanned: number
  candidates_count: number
  candidates: string[]
  summary: ScanSummary
  rationale: RationaleTrail
}
