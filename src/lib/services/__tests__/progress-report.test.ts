import { describe, it, expect } from 'vitest'
import { buildProgressReport, formatProgressReport } from '../progress-report'
import { createRunStats } from '../orchestrator'

function runStats(submitted: number, startedAtMs = 0) {
  return { ...createRunStats(startedAtMs), submitted }
}

describe('buildProgressReport', () => {
  it('computes completion, rate and ETA', () => {
    const report = buildProgressReport(
      { completed: 150, failed: 10, total: 160 },
      runStats(160),
      120_000,
      1000
    )

    expect(report).toEqual({
      totalRecords: 160,
      completed: 150,
      failed: 10,
      completedPct: 93.8,
      ratePerMin: 80,
      elapsedMin: 2,
      etaMin: 10.6,
    })
  })

  it('has no ETA without a target', () => {
    const report = buildProgressReport({ completed: 10, failed: 0, total: 10 }, runStats(10), 60_000)
    expect(report.etaMin).toBeNull()
  })

  it('has no rate or ETA before any time has passed', () => {
    const report = buildProgressReport({ completed: 0, failed: 0, total: 0 }, runStats(0, 5000), 5000, 100)
    expect(report.ratePerMin).toBe(0)
    expect(report.etaMin).toBeNull()
    expect(report.completedPct).toBe(0)
  })

  it('reports zero remaining once the target is reached', () => {
    const report = buildProgressReport({ completed: 120, failed: 0, total: 120 }, runStats(120), 60_000, 100)
    expect(report.etaMin).toBe(0)
  })
})

describe('formatProgressReport', () => {
  it('renders one line per figure', () => {
    expect(
      formatProgressReport({
        totalRecords: 12345,
        completed: 12000,
        failed: 345,
        completedPct: 97.2,
        ratePerMin: 80,
        elapsedMin: 2,
        etaMin: 10.6,
      })
    ).toEqual([
      'Records: 12,345',
      '  Completed: 12,000 (97.2%)',
      '  Failed: 345',
      'Rate: 80.0 records/min',
      'Elapsed: 2.0 min',
      'ETA: 10.6 min',
    ])
  })

  it('omits the ETA line when unknown', () => {
    const lines = formatProgressReport({
      totalRecords: 0,
      completed: 0,
      failed: 0,
      completedPct: 0,
      ratePerMin: 0,
      elapsedMin: 0,
      etaMin: null,
    })
    expect(lines).toHaveLength(5)
    expect(lines[4]).toBe('Elapsed: 0.0 min')
  })
})
