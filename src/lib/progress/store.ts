/**
 * Progress Store
 *
 * Durable ledger of per-record outcomes keyed by (sourceId, recordId).
 * Writes are synchronous upserts: when a method returns, the row is
 * committed; when it cannot commit, it throws ProgressStoreError.
 *
 * A `completed` entry is permanent. Callers must not resubmit it.
 */

import type Database from 'better-sqlite3'
import { openDatabase } from '../db'
import type { SqliteDatabase } from '../db'
import { ProgressStoreError } from '../errors'
import { isLabel } from '../labels'
import type { Label } from '../labels'

export type ProgressStatus = 'completed' | 'failed'

export interface ProgressEntry {
  sourceId: string
  recordId: number
  status: ProgressStatus
  /** Present iff status is 'completed' */
  label: Label | null
  attemptCount: number
  /** Present iff status is 'failed' */
  errorMessage: string | null
  createdAt: string
  updatedAt: string
}

export interface ProgressStats {
  completed: number
  failed: number
  total: number
}

export type ProgressOutcome =
  | { sourceId: string; recordId: number; status: 'completed'; label: Label; attemptCount: number }
  | { sourceId: string; recordId: number; status: 'failed'; errorMessage: string; attemptCount: number }

interface ProgressRow {
  source_id: string
  record_id: number
  status: string
  label: string | null
  attempt_count: number
  error_message: string | null
  created_at: string
  updated_at: string
}

interface UpsertParams {
  sourceId: string
  recordId: number
  status: ProgressStatus
  label: string | null
  attemptCount: number
  errorMessage: string | null
  now: string
}

type IdentityParams = [sourceId: string, recordId: number]

export interface ProgressStoreOptions {
  /** Timestamp source for created_at / updated_at */
  now?: () => Date
}

const ERROR_MESSAGE_MAX_CHARS = 500

function capString(value: string, maxChars: number): string {
  return value.length <= maxChars ? value : `${value.slice(0, maxChars)}...`
}

function toEntry(row: ProgressRow): ProgressEntry {
  return {
    sourceId: row.source_id,
    recordId: row.record_id,
    status: row.status === 'completed' ? 'completed' : 'failed',
    label: isLabel(row.label) ? row.label : null,
    attemptCount: row.attempt_count,
    errorMessage: row.error_message,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export class ProgressStore {
  private readonly db: SqliteDatabase
  private readonly now: () => Date
  private readonly upsertStmt: Database.Statement<[UpsertParams]>
  private readonly completedStmt: Database.Statement<IdentityParams, { found: number }>
  private readonly entryStmt: Database.Statement<IdentityParams, ProgressRow>
  private readonly labelsStmt: Database.Statement<[sourceId: string], { record_id: number; label: string | null }>
  private readonly statsStmt: Database.Statement<[], { status: string; count: number }>
  private readonly sourceStatsStmt: Database.Statement<[sourceId: string], { status: string; count: number }>

  constructor(db: SqliteDatabase, options: ProgressStoreOptions = {}) {
    this.db = db
    this.now = options.now ?? (() => new Date())

    this.upsertStmt = db.prepare<UpsertParams>(`
      INSERT INTO progress
        (source_id, record_id, status, label, attempt_count, error_message, created_at, updated_at)
      VALUES
        (@sourceId, @recordId, @status, @label, @attemptCount, @errorMessage, @now, @now)
      ON CONFLICT (source_id, record_id) DO UPDATE SET
        status = excluded.status,
        label = excluded.label,
        attempt_count = excluded.attempt_count,
        error_message = excluded.error_message,
        updated_at = excluded.updated_at
    `)
    this.completedStmt = db.prepare<IdentityParams, { found: number }>(
      `SELECT 1 AS found FROM progress WHERE source_id = ? AND record_id = ? AND status = 'completed'`
    )
    this.entryStmt = db.prepare<IdentityParams, ProgressRow>(
      `SELECT * FROM progress WHERE source_id = ? AND record_id = ?`
    )
    this.labelsStmt = db.prepare<[string], { record_id: number; label: string | null }>(
      `SELECT record_id, label FROM progress WHERE source_id = ? AND status = 'completed'`
    )
    this.statsStmt = db.prepare<[], { status: string; count: number }>(
      `SELECT status, COUNT(*) AS count FROM progress GROUP BY status`
    )
    this.sourceStatsStmt = db.prepare<[string], { status: string; count: number }>(
      `SELECT status, COUNT(*) AS count FROM progress WHERE source_id = ? GROUP BY status`
    )
  }

  /**
   * Opens a store backed by the SQLite file at `path` (or memory).
   */
  static open(path?: string, options?: ProgressStoreOptions): ProgressStore {
    return new ProgressStore(openDatabase(path), options)
  }

  isCompleted(sourceId: string, recordId: number): boolean {
    return this.completedStmt.get(sourceId, recordId) !== undefined
  }

  getEntry(sourceId: string, recordId: number): ProgressEntry | undefined {
    const row = this.entryStmt.get(sourceId, recordId)
    return row ? toEntry(row) : undefined
  }

  /**
   * Labels of every completed record in a source, keyed by recordId.
   */
  completedLabels(sourceId: string): Map<number, Label> {
    const labels = new Map<number, Label>()
    for (const row of this.labelsStmt.all(sourceId)) {
      if (isLabel(row.label)) labels.set(row.record_id, row.label)
    }
    return labels
  }

  /**
   * Idempotent upsert; replaces any earlier entry for the identity.
   *
   * @throws ProgressStoreError if the write cannot be committed
   */
  markCompleted(sourceId: string, recordId: number, label: Label, attemptCount = 1): void {
    this.write(() =>
      this.upsert({ sourceId, recordId, status: 'completed', label, attemptCount })
    )
  }

  /**
   * Idempotent upsert; replaces any earlier entry for the identity.
   *
   * @throws ProgressStoreError if the write cannot be committed
   */
  markFailed(sourceId: string, recordId: number, errorMessage: string, attemptCount: number): void {
    this.write(() =>
      this.upsert({ sourceId, recordId, status: 'failed', errorMessage, attemptCount })
    )
  }

  /**
   * Applies all outcomes of one batch in a single transaction:
   * either every entry is committed or none is.
   *
   * @throws ProgressStoreError if the transaction cannot be committed
   */
  writeOutcomes(outcomes: readonly ProgressOutcome[]): void {
    const apply = this.db.transaction((items: readonly ProgressOutcome[]) => {
      for (const outcome of items) this.upsert(outcome)
    })
    this.write(() => apply(outcomes))
  }

  stats(sourceId?: string): ProgressStats {
    const rows = sourceId === undefined ? this.statsStmt.all() : this.sourceStatsStmt.all(sourceId)
    const stats: ProgressStats = { completed: 0, failed: 0, total: 0 }
    for (const row of rows) {
      if (row.status === 'completed') stats.completed = row.count
      if (row.status === 'failed') stats.failed = row.count
      stats.total += row.count
    }
    return stats
  }

  close(): void {
    this.db.close()
  }

  private upsert(outcome: ProgressOutcome): void {
    this.upsertStmt.run({
      sourceId: outcome.sourceId,
      recordId: outcome.recordId,
      status: outcome.status,
      label: outcome.status === 'completed' ? outcome.label : null,
      attemptCount: outcome.attemptCount,
      errorMessage:
        outcome.status === 'failed' ? capString(outcome.errorMessage, ERROR_MESSAGE_MAX_CHARS) : null,
      now: this.now().toISOString(),
    })
  }

  private write(fn: () => void): void {
    try {
      fn()
    } catch (err) {
      throw new ProgressStoreError(
        `Progress write failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err.name : typeof err }
      )
    }
  }
}
