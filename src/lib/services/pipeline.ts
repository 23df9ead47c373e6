/**
 * Pipeline assembly
 *
 * Builds the owned objects of one job from a PipelineConfig: a RateGovernor,
 * a ProgressStore, a ClassificationClient, a BatchOrchestrator and the
 * FilePipeline on top. Pass an existing governor to share one rate budget
 * between jobs.
 */

import type { PipelineConfig } from '../config'
import { RateGovernor, realClock } from '../llm'
import type { Clock, LlmCaller } from '../llm'
import { ProgressStore } from '../progress/store'
import { ClassificationClient } from './classify'
import { BatchOrchestrator } from './orchestrator'
import { FilePipeline } from './file-pipeline'

export interface PipelineOverrides {
  governor?: RateGovernor
  store?: ProgressStore
  callLlm?: LlmCaller
  clock?: Clock
}

export interface Pipeline {
  governor: RateGovernor
  store: ProgressStore
  client: ClassificationClient
  orchestrator: BatchOrchestrator
  files: FilePipeline
  close(): void
}

export function createPipeline(config: PipelineConfig, overrides: PipelineOverrides = {}): Pipeline {
  const clock = overrides.clock ?? realClock
  const governor =
    overrides.governor ??
    new RateGovernor({
      maxCalls: config.rate.maxCalls,
      maxUnits: config.rate.maxUnits,
      windowMs: config.rate.windowMs,
      pollIntervalMs: config.rate.pollIntervalMs,
      clock,
    })
  const store = overrides.store ?? ProgressStore.open(config.progressDbPath)

  const client = new ClassificationClient({
    governor,
    fields: config.fields,
    maxRetries: config.maxRetries,
    baseDelayMs: config.baseDelayMs,
    estimatedUnits: config.rate.estimatedUnits,
    callLlm: overrides.callLlm,
    clock,
  })
  const orchestrator = new BatchOrchestrator({
    client,
    store,
    batchSize: config.batchSize,
    maxParallel: config.maxParallel,
    minBatchDurationMs: config.minBatchDurationMs,
    clock,
  })
  const files = new FilePipeline({
    orchestrator,
    store,
    fields: config.fields,
    labelColumn: config.labelColumn,
    clock,
  })

  return {
    governor,
    store,
    client,
    orchestrator,
    files,
    close: () => store.close(),
  }
}
