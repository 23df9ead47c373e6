/**
 * Batch Orchestrator
 *
 * Drives one source's records to full label coverage:
 *
 * 1. Partition records into windows of batchSize, in input order.
 * 2. Drop records the progress store already has as completed; their
 *    label is read back from the store.
 * 3. Skip windows that end up empty (no call, no write, no pacing).
 * 4. Classify the rest, write every outcome in one store transaction.
 * 5. Pace each batch to at least minBatchDurationMs.
 *
 * Windows run in chunks of maxParallel; a chunk is a barrier, the next one
 * starts only after every batch in it has settled. A store failure aborts
 * the run after the barrier. An AbortSignal stops the run between chunks.
 */

import type { Logger } from 'pino'
import { createLogger } from '../logger'
import { InvalidInputError } from '../errors'
import { FALLBACK_LABEL } from '../labels'
import type { Label } from '../labels'
import { realClock } from '../llm'
import type { Clock } from '../llm'
import type { ProgressOutcome, ProgressStore } from '../progress/store'
import type { ClassificationRecord } from '../types/record'
import type { BatchClassification } from './classify'

/** The slice of ClassificationClient the orchestrator depends on */
export interface BatchClassifier {
  classify(batch: readonly ClassificationRecord[]): Promise<BatchClassification>
}

export interface RunStats {
  startedAtMs: number
  records: number
  /** Records already completed in the store before this run reached them */
  skipped: number
  submitted: number
  completed: number
  failed: number
  /** Labels that are the fallback: soft failures plus per-index fallbacks */
  fallbackLabels: number
  batches: number
  skippedBatches: number
  softFailedBatches: number
  unitsUsed: number
}

export function createRunStats(startedAtMs: number): RunStats {
  return {
    startedAtMs,
    records: 0,
    skipped: 0,
    submitted: 0,
    completed: 0,
    failed: 0,
    fallbackLabels: 0,
    batches: 0,
    skippedBatches: 0,
    softFailedBatches: 0,
    unitsUsed: 0,
  }
}

export interface BatchOrchestratorOptions {
  client: BatchClassifier
  store: ProgressStore
  batchSize: number
  /** Batches in flight at once (default: 1) */
  maxParallel?: number
  /** Minimum wall-clock time per classified batch (default: 0) */
  minBatchDurationMs?: number
  clock?: Clock
  logger?: Logger
}

export interface RunOptions {
  /** Checked between chunks; an aborted run returns interrupted=true */
  signal?: AbortSignal
  /** Stats to accumulate into, e.g. shared across the files of a directory */
  stats?: RunStats
  /** Called after every chunk barrier */
  onChunk?: (stats: RunStats) => void
}

export interface OrchestratorResult {
  sourceId: string
  /** recordId -> label; complete unless interrupted */
  labels: Map<number, Label>
  stats: RunStats
  interrupted: boolean
}

export function partition<T>(items: readonly T[], size: number): T[][] {
  const groups: T[][] = []
  for (let start = 0; start < items.length; start += size) {
    groups.push(items.slice(start, start + size))
  }
  return groups
}

export class BatchOrchestrator {
  private readonly client: BatchClassifier
  private readonly store: ProgressStore
  private readonly batchSize: number
  private readonly maxParallel: number
  private readonly minBatchDurationMs: number
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: BatchOrchestratorOptions) {
    const maxParallel = options.maxParallel ?? 1
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new InvalidInputError('batchSize must be a positive integer', { batchSize: options.batchSize })
    }
    if (!Number.isInteger(maxParallel) || maxParallel < 1) {
      throw new InvalidInputError('maxParallel must be a positive integer', { maxParallel })
    }

    this.client = options.client
    this.store = options.store
    this.batchSize = options.batchSize
    this.maxParallel = maxParallel
    this.minBatchDurationMs = options.minBatchDurationMs ?? 0
    this.clock = options.clock ?? realClock
    this.logger = options.logger ?? createLogger('orchestrator')
  }

  /**
   * Labels every record of one source.
   *
   * @throws InvalidInputError if a record belongs to another source or a recordId repeats
   * @throws ProgressStoreError if an outcome cannot be persisted
   */
  async run(
    sourceId: string,
    records: readonly ClassificationRecord[],
    options: RunOptions = {}
  ): Promise<OrchestratorResult> {
    this.assertRecords(sourceId, records)

    const stats = options.stats ?? createRunStats(this.clock.now())
    const labels = new Map<number, Label>()
    const windows = partition(records, this.batchSize)
    const chunks = partition(windows, this.maxParallel)
    stats.records += records.length

    let interrupted = false
    for (const chunk of chunks) {
      if (options.signal?.aborted) {
        interrupted = true
        this.logger.warn({ sourceId, labeled: labels.size, total: records.length }, 'Run interrupted between chunks')
        break
      }

      const settled = await Promise.allSettled(
        chunk.map((window) => this.processWindow(sourceId, window, labels, stats))
      )
      const failure = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected')
      if (failure) {
        throw failure.reason
      }

      options.onChunk?.(stats)
    }

    this.logger.info(
      {
        sourceId,
        records: records.length,
        labeled: labels.size,
        skipped: stats.skipped,
        completed: stats.completed,
        failed: stats.failed,
        interrupted,
      },
      'Source run finished'
    )

    return { sourceId, labels, stats, interrupted }
  }

  private async processWindow(
    sourceId: string,
    window: readonly ClassificationRecord[],
    labels: Map<number, Label>,
    stats: RunStats
  ): Promise<void> {
    const batch: ClassificationRecord[] = []
    for (const record of window) {
      if (this.store.isCompleted(sourceId, record.recordId)) {
        labels.set(record.recordId, this.store.getEntry(sourceId, record.recordId)?.label ?? FALLBACK_LABEL)
        stats.skipped += 1
        continue
      }
      batch.push(record)
    }

    if (batch.length === 0) {
      stats.skippedBatches += 1
      return
    }

    const startedAt = this.clock.now()
    const result = await this.client.classify(batch)
    this.store.writeOutcomes(this.toOutcomes(sourceId, batch, result))

    batch.forEach((record, index) => labels.set(record.recordId, result.labels[index]))
    stats.batches += 1
    stats.submitted += batch.length
    stats.unitsUsed += result.unitsUsed
    stats.fallbackLabels += result.fallbackIndices.length
    if (result.softFailed) {
      stats.softFailedBatches += 1
      stats.failed += batch.length
    } else {
      stats.completed += batch.length
    }

    const elapsedMs = this.clock.now() - startedAt
    if (elapsedMs < this.minBatchDurationMs) {
      const remainingMs = this.minBatchDurationMs - elapsedMs
      this.logger.debug({ sourceId, remainingMs }, 'Pacing batch')
      await this.clock.sleep(remainingMs)
    }
  }

  private toOutcomes(
    sourceId: string,
    batch: readonly ClassificationRecord[],
    result: BatchClassification
  ): ProgressOutcome[] {
    return batch.map((record, index): ProgressOutcome => {
      if (result.softFailed) {
        return {
          sourceId,
          recordId: record.recordId,
          status: 'failed',
          errorMessage: result.error ?? 'retries exhausted',
          attemptCount: result.attempts,
        }
      }
      return {
        sourceId,
        recordId: record.recordId,
        status: 'completed',
        label: result.labels[index],
        attemptCount: result.attempts,
      }
    })
  }

  private assertRecords(sourceId: string, records: readonly ClassificationRecord[]): void {
    const seen = new Set<number>()
    for (const record of records) {
      if (record.sourceId !== sourceId) {
        throw new InvalidInputError(`Record belongs to source "${record.sourceId}", expected "${sourceId}"`, {
          recordId: record.recordId,
        })
      }
      if (seen.has(record.recordId)) {
        throw new InvalidInputError(`Duplicate recordId ${record.recordId} in source "${sourceId}"`)
      }
      seen.add(record.recordId)
    }
  }
}
