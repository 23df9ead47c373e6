/**
 * Progress Report
 *
 * Combines store totals with the current run's stats into the numbers an
 * operator watches: completion, failures, throughput and ETA.
 */

import type { ProgressStats } from '../progress/store'
import type { RunStats } from './orchestrator'

export interface ProgressReport {
  totalRecords: number
  completed: number
  failed: number
  completedPct: number
  /** Records submitted per minute in this run */
  ratePerMin: number
  elapsedMin: number
  /** Minutes until expectedTotal is completed; null without a target or rate */
  etaMin: number | null
}

function round1(value: number): number {
  return Math.round(value * 10) / 10
}

export function buildProgressReport(
  storeStats: ProgressStats,
  runStats: RunStats,
  nowMs: number,
  expectedTotal?: number
): ProgressReport {
  const elapsedMin = Math.max(nowMs - runStats.startedAtMs, 0) / 60_000
  const ratePerMin = elapsedMin > 0 ? runStats.submitted / elapsedMin : 0

  let etaMin: number | null = null
  if (expectedTotal !== undefined && ratePerMin > 0) {
    etaMin = Math.max(expectedTotal - storeStats.completed, 0) / ratePerMin
  }

  return {
    totalRecords: storeStats.total,
    completed: storeStats.completed,
    failed: storeStats.failed,
    completedPct: round1((storeStats.completed / Math.max(storeStats.total, 1)) * 100),
    ratePerMin: round1(ratePerMin),
    elapsedMin: round1(elapsedMin),
    etaMin: etaMin === null ? null : round1(etaMin),
  }
}

export function formatProgressReport(report: ProgressReport): string[] {
  const count = (value: number) => value.toLocaleString('en-US')
  const lines = [
    `Records: ${count(report.totalRecords)}`,
    `  Completed: ${count(report.completed)} (${report.completedPct.toFixed(1)}%)`,
    `  Failed: ${count(report.failed)}`,
    `Rate: ${report.ratePerMin.toFixed(1)} records/min`,
    `Elapsed: ${report.elapsedMin.toFixed(1)} min`,
  ]
  if (report.etaMin !== null) {
    lines.push(`ETA: ${report.etaMin.toFixed(1)} min`)
  }
  return lines
}
