import fs from 'node:fs'
import path from 'node:path'
import { loadConfig } from '../services/screener/config'
import { parseBatch } from '../services/screener/batch'
import { runPipeline } from '../services/screener/pipeline'
import { buildAuditRecord, rationaleId, summarizeScan } from '../services/screener/audit'
import { buildWatchlist } from '../services/screener/watchlist'
import { errorMessage } from '../services/screener/errors'

// Usage: tsx scripts/run_scan.ts <batch.json>
function main(): void {
  const file = process.argv[2]
  if (!file) {
    console.error('Usage: tsx scripts/run_scan.ts <batch.json>')
    process.exit(2)
  }

  const raw: unknown = JSON.parse(fs.readFileSync(path.resolve(process.cwd(), file), 'utf8'))
  const batch = parseBatch(raw)
  const config = loadConfig()
  const result = runPipeline(batch, config)
  const summary = summarizeScan(result)
  const year = new Date().getUTCFullYear()

  console.log('='.repeat(80))
  console.log(' SCAN SUMMARY')
  console.log('='.repeat(80))
  console.log(`Total Stocks Scanned: ${summary.total_scanned}`)
  console.log(`Passed G1 (Liquidity): ${summary.passed_g1}`)
  console.log(`Passed G2 (Quality):   ${summary.passed_g2}`)
  console.log(`Passed G2B (Inst.):    ${summary.passed_g2b}`)
  console.log(`Coiling Springs:       ${summary.coiling_springs}`)
  console.log(`Total Candidates:      ${summary.passed_all}`)
  console.log('-'.repeat(80))
  for (const c of result.candidates) {
    const trade = c.trade
      ? `entry ${c.trade.entry.toFixed(2)} stop ${c.trade.stop.toFixed(2)} target ${c.trade.target.toFixed(2)} | ${c.trade.holdingPeriod}`
      : 'no trade plan'
    console.log(`${c.status.padEnd(14)} | ${c.ticker.padEnd(14)} | ${c.capTier.padEnd(5)} | ${rationaleId(c.ticker, c.capTier, year)} | ${trade}`)
  }

  const levelsOnly = Object.entries(result.trades).filter(([t]) => !result.candidates.some(c => c.ticker === t))
  if (levelsOnly.length) {
    console.log('-'.repeat(80))
    console.log(`TRADE LEVELS (cleared Gate 2B, not a candidate): ${levelsOnly.length}`)
    for (const [ticker, plan] of levelsOnly) {
      console.log(`${ticker.padEnd(14)} | ${plan ? `entry ${plan.entry.toFixed(2)} stop ${plan.stop.toFixed(2)} target ${plan.target.toFixed(2)}` : 'no trade plan'}`)
    }
  }

  const watchlist = buildWatchlist(result)
  if (watchlist.length) {
    console.log('-'.repeat(80))
    console.log(`COILING SPRINGS (Daily Watchlist): ${watchlist.length}`)
    for (const w of watchlist) console.log(`${w.ticker.padEnd(14)} | ${w.sector.slice(0, 15).padEnd(15)} | ${w.close.toFixed(2)} | ${w.reason.slice(0, 40)}`)
  }
  console.log('='.repeat(80))
  console.log(JSON.stringify(buildAuditRecord(result), null, 2))
}

try {
  main()
} catch (e) {
  console.error('[SCAN_FAILED]', errorMessage(e))
  process.exit(1)
}
