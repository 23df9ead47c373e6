/**
 * Core library exports
 */

// Labels
export {
  LABEL_VALUES,
  FALLBACK_LABEL,
  UNKNOWN_LABEL,
  isLabel,
  parseLabel,
  resolveLabel,
  type Label,
  type ParsedLabel,
} from './labels'

// Configuration
export {
  loadPipelineConfig,
  parseFieldColumns,
  DEFAULT_FIELD_COLUMNS,
  type PipelineConfig,
  type RateConfig,
  type FieldSpec,
} from './config'

// Errors
export {
  ServiceError,
  InvalidInputError,
  ProgressStoreError,
  RowCountMismatchError,
} from './errors'

// LLM plumbing and rate governing
export {
  callLlm,
  dryRunLabelFor,
  RateGovernor,
  realClock,
  LlmError,
  MissingApiKeyError,
  LlmProviderError,
  LlmBadOutputError,
  type Clock,
  type Reservation,
  type RateGovernorOptions,
  type LlmCaller,
  type LlmRequest,
  type LlmResponse,
  type ProviderId,
} from './llm'

// Records
export type { ClassificationRecord, RecordFields } from './types/record'

// Progress store
export {
  ProgressStore,
  type ProgressEntry,
  type ProgressStats,
  type ProgressStatus,
  type ProgressOutcome,
} from './progress/store'

// Classification
export {
  ClassificationClient,
  backoffDelayMs,
  buildUserMessage,
  parseClassifyOutput,
  reconcilePredictions,
  recordKey,
  type BatchClassification,
  type ClassificationClientOptions,
} from './services/classify'

// Orchestration
export {
  BatchOrchestrator,
  createRunStats,
  partition,
  type BatchClassifier,
  type OrchestratorResult,
  type RunStats,
  type RunOptions,
} from './services/orchestrator'

// Files
export {
  FilePipeline,
  parseCsv,
  formatCsv,
  withLabelColumn,
  listCsvFiles,
  type CsvTable,
  type FileResult,
  type DirectoryResult,
} from './services/file-pipeline'

// Reporting
export { buildProgressReport, formatProgressReport, type ProgressReport } from './services/progress-report'

// Assembly
export { createPipeline, type Pipeline, type PipelineOverrides } from './services/pipeline'
