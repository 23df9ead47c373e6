/**
 * Classification Client
 *
 * Turns one ordered batch of records into exactly one label per record.
 *
 * - Every attempt waits on the RateGovernor before calling out.
 * - Transport, parse and schema failures are retried with exponential
 *   backoff (baseDelayMs * 2^attempt, no jitter) up to maxRetries.
 * - When retries run out the batch is soft-failed: every position gets
 *   FALLBACK_LABEL and nothing is thrown.
 * - Per-index problems (missing prediction, label outside the set) fall
 *   back for that index only and are never retried.
 */

import { z } from 'zod'
import type { Logger } from 'pino'
import { createLogger } from '../logger'
import { InvalidInputError } from '../errors'
import { FALLBACK_LABEL, LABEL_VALUES, resolveLabel } from '../labels'
import type { Label } from '../labels'
import type { FieldSpec } from '../config'
import type { ClassificationRecord } from '../types/record'
import { sha256 } from '../hash'
import { callLlm, getModel, getProvider, getMaxTokens, getTemperature, LlmBadOutputError, realClock } from '../llm'
import type { Clock, LlmCaller, LlmRequest, ProviderId, RateGovernor } from '../llm'

export const CLASSIFY_SYSTEM_PROMPT = `You classify voters from Kerala, India by likely religious background, using only their name, guardian's name and house name.

Typical signals:
- Hindu: deity and Sanskrit-origin names (Krishna, Lakshmi, Devi), -an/-kuttan/-kumari endings, house names with Bhavanam, Mandiram or Illam.
- Christian: biblical and saints' names (George, Mary, Thomas, Xavier), house names with Villa or Nivas.
- Muslim: Arabic-origin names (Mohammed, Abdul, Fathima, Ayesha), house names with Manzil or Purayidam.

Every voter MUST get exactly one label from: ${LABEL_VALUES.join(', ')}. No other values are allowed.

Respond with a JSON object of exactly this shape, one entry per voter, using the voter's number as "index":
{"predictions": [{"index": 0, "label": "${LABEL_VALUES[0]}"}, {"index": 1, "label": "${LABEL_VALUES[1]}"}]}`

const predictionSchema = z.object({
  index: z.number().int(),
  label: z.unknown(),
})

const classifyResponseSchema = z.object({
  predictions: z.array(predictionSchema),
})

export type ClassifyPrediction = z.infer<typeof predictionSchema>

export interface BatchClassification {
  /** One label per batch position, always from the closed set */
  labels: Label[]
  /** True when retries were exhausted and every label is the fallback */
  softFailed: boolean
  /** Attempts made, 1..maxRetries+1 */
  attempts: number
  /** Capacity units recorded against the governor */
  unitsUsed: number
  /** Positions that received the fallback on an otherwise successful call */
  fallbackIndices: number[]
  /** Last attempt error, set only when softFailed */
  error?: string
}

export interface ClassificationClientOptions {
  governor: RateGovernor
  fields: FieldSpec[]
  maxRetries: number
  /** Backoff base; the delay after failed attempt n is baseDelayMs * 2^n */
  baseDelayMs: number
  /** Units assumed for a call before its usage is known (default: 1000) */
  estimatedUnits?: number
  provider?: ProviderId
  model?: string
  maxTokens?: number
  temperature?: number
  callLlm?: LlmCaller
  clock?: Clock
  logger?: Logger
}

const DEFAULT_ESTIMATED_UNITS = 1000

/**
 * Delay before the retry that follows failed attempt `attempt` (0-based).
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** attempt
}

/**
 * Stable key for a record's content, used by dry-run mode to pick labels.
 */
export function recordKey(record: ClassificationRecord, fields: FieldSpec[]): string {
  return sha256(fields.map((field) => record.fields[field.key] ?? '').join('\u001f'))
}

/**
 * Lists each record on its own line, prefixed by its batch position.
 *
 * 0. Name: Anil Kumar, Guardian: Raghavan, House: Sree Bhavanam
 */
export function buildUserMessage(batch: readonly ClassificationRecord[], fields: FieldSpec[]): string {
  const lines = batch.map((record, index) => {
    const parts = fields.map((field) => `${field.promptLabel}: ${record.fields[field.key] ?? ''}`)
    return `${index}. ${parts.join(', ')}`
  })
  return `Classify these voters:\n\n${lines.join('\n')}`
}

function extractJsonCandidates(rawText: string): string[] {
  const candidates: string[] = []
  const seen = new Set<string>()

  const addCandidate = (candidate: string) => {
    const trimmed = candidate.trim()
    if (!trimmed || seen.has(trimmed)) return
    seen.add(trimmed)
    candidates.push(trimmed)
  }

  // Fast path: already clean JSON
  addCandidate(rawText)

  // Fenced code blocks
  const fencedBlockRegex = /```(?:json)?\s*([\s\S]*?)\s*```/gi
  let match: RegExpExecArray | null
  while ((match = fencedBlockRegex.exec(rawText)) !== null) {
    addCandidate(match[1])
  }

  // First balanced JSON object embedded in prose
  let depth = 0
  let objectStart = -1
  let inString = false
  let escaped = false
  for (let i = 0; i < rawText.length; i++) {
    const ch = rawText[i]

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === '"') {
        inString = false
      }
      continue
    }

    if (ch === '"') {
      inString = true
      continue
    }

    if (ch === '{') {
      if (depth === 0) objectStart = i
      depth += 1
      continue
    }

    if (ch === '}' && depth > 0) {
      depth -= 1
      if (depth === 0 && objectStart >= 0) {
        addCandidate(rawText.slice(objectStart, i + 1))
        objectStart = -1
      }
    }
  }

  return candidates
}

/**
 * Parses and validates the service response.
 *
 * Expected format: {"predictions":[{"index":0,"label":"Hindu"}]}
 * Label values are not checked here; see reconcilePredictions.
 *
 * @throws LlmBadOutputError if no candidate is JSON or none matches the schema
 */
export function parseClassifyOutput(text: string): ClassifyPrediction[] {
  const parseErrors: string[] = []
  let schemaIssues: string[] | undefined

  for (const candidate of extractJsonCandidates(text)) {
    let parsed: unknown
    try {
      parsed = JSON.parse(candidate)
    } catch (err) {
      parseErrors.push(err instanceof Error ? err.message : 'Unknown parse error')
      continue
    }

    const result = classifyResponseSchema.safeParse(parsed)
    if (result.success) {
      return result.data.predictions
    }
    schemaIssues ??= result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
  }

  if (schemaIssues) {
    throw new LlmBadOutputError('LLM output does not match the predictions schema', {
      issues: schemaIssues.slice(0, 3),
    })
  }
  throw new LlmBadOutputError('LLM output is not valid JSON', {
    candidatesTried: parseErrors.length,
    parseErrors: parseErrors.slice(0, 3),
  })
}

export interface ReconciledLabels {
  labels: Label[]
  missingIndices: number[]
  invalid: Array<{ index: number; value: unknown }>
  duplicateIndices: number[]
}

/**
 * Maps predictions back to batch positions 0..size-1 by their index field,
 * never by response order. The first prediction for an index wins; later
 * duplicates are ignored.
 */
export function reconcilePredictions(predictions: readonly ClassifyPrediction[], size: number): ReconciledLabels {
  const byIndex = new Map<number, ClassifyPrediction>()
  const duplicates = new Set<number>()
  for (const prediction of predictions) {
    if (byIndex.has(prediction.index)) {
      duplicates.add(prediction.index)
      continue
    }
    byIndex.set(prediction.index, prediction)
  }

  const labels: Label[] = []
  const missingIndices: number[] = []
  const invalid: ReconciledLabels['invalid'] = []

  for (let index = 0; index < size; index++) {
    const prediction = byIndex.get(index)
    if (!prediction) {
      missingIndices.push(index)
      labels.push(FALLBACK_LABEL)
      continue
    }
    const resolved = resolveLabel(prediction.label)
    if (resolved.fallback) {
      invalid.push({ index, value: prediction.label })
    }
    labels.push(resolved.label)
  }

  return { labels, missingIndices, invalid, duplicateIndices: [...duplicates].sort((a, b) => a - b) }
}

export class ClassificationClient {
  private readonly governor: RateGovernor
  private readonly fields: FieldSpec[]
  private readonly maxRetries: number
  private readonly baseDelayMs: number
  private readonly estimatedUnits: number
  private readonly provider: ProviderId
  private readonly model: string
  private readonly maxTokens: number
  private readonly temperature: number
  private readonly callLlm: LlmCaller
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: ClassificationClientOptions) {
    if (options.maxRetries < 0) {
      throw new InvalidInputError('maxRetries must be >= 0', { maxRetries: options.maxRetries })
    }
    this.governor = options.governor
    this.fields = options.fields
    this.maxRetries = options.maxRetries
    this.baseDelayMs = options.baseDelayMs
    this.estimatedUnits = options.estimatedUnits ?? DEFAULT_ESTIMATED_UNITS
    this.provider = options.provider ?? getProvider()
    this.model = options.model ?? getModel()
    this.maxTokens = options.maxTokens ?? getMaxTokens()
    this.temperature = options.temperature ?? getTemperature()
    this.callLlm = options.callLlm ?? callLlm
    this.clock = options.clock ?? realClock
    this.logger = options.logger ?? createLogger('classify')
  }

  /**
   * Classifies one batch. Always resolves with batch.length labels.
   *
   * @throws InvalidInputError if the batch is empty
   */
  async classify(batch: readonly ClassificationRecord[]): Promise<BatchClassification> {
    if (batch.length === 0) {
      throw new InvalidInputError('Cannot classify an empty batch')
    }

    const request = this.buildRequest(batch)
    let lastError = 'unknown error'

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delayMs = backoffDelayMs(attempt - 1, this.baseDelayMs)
        this.logger.warn({ attempt: attempt + 1, delayMs, batchSize: batch.length }, 'Retrying batch after backoff')
        await this.clock.sleep(delayMs)
      }

      const reservation = await this.governor.awaitCapacity(this.estimatedUnits)

      try {
        const response = await this.callLlm(request)
        const predictions = parseClassifyOutput(response.text)

        const reportedUnits = response.tokensIn + response.tokensOut
        const unitsUsed = reportedUnits > 0 ? reportedUnits : this.estimatedUnits
        this.governor.recordCall(unitsUsed, reservation)

        const reconciled = reconcilePredictions(predictions, batch.length)
        this.reportFallbacks(batch, reconciled)

        return {
          labels: reconciled.labels,
          softFailed: false,
          attempts: attempt + 1,
          unitsUsed,
          fallbackIndices: [...reconciled.missingIndices, ...reconciled.invalid.map((item) => item.index)].sort(
            (a, b) => a - b
          ),
        }
      } catch (err) {
        this.governor.release(reservation)
        lastError = err instanceof Error ? err.message : String(err)
        this.logger.error(
          {
            attempt: attempt + 1,
            maxAttempts: this.maxRetries + 1,
            code: typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined,
            error: lastError,
          },
          'Batch classification attempt failed'
        )
      }
    }

    const attempts = this.maxRetries + 1
    this.logger.error(
      { attempts, batchSize: batch.length, fallback: FALLBACK_LABEL },
      'Retries exhausted, using fallback label for whole batch'
    )

    return {
      labels: batch.map(() => FALLBACK_LABEL),
      softFailed: true,
      attempts,
      unitsUsed: 0,
      fallbackIndices: batch.map((_, index) => index),
      error: lastError,
    }
  }

  private buildRequest(batch: readonly ClassificationRecord[]): LlmRequest {
    return {
      provider: this.provider,
      model: this.model,
      system: CLASSIFY_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildUserMessage(batch, this.fields) }],
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      jsonOutput: true,
      metadata: {
        stage: 'classify',
        recordKeys: batch.map((record) => recordKey(record, this.fields)),
      },
    }
  }

  private reportFallbacks(batch: readonly ClassificationRecord[], reconciled: ReconciledLabels): void {
    for (const index of reconciled.missingIndices) {
      this.logger.warn(
        { index, sourceId: batch[index].sourceId, recordId: batch[index].recordId, fallback: FALLBACK_LABEL },
        'No prediction for index, using fallback label'
      )
    }
    for (const { index, value } of reconciled.invalid) {
      this.logger.warn(
        { index, sourceId: batch[index].sourceId, recordId: batch[index].recordId, value, fallback: FALLBACK_LABEL },
        'Invalid label in prediction, using fallback label'
      )
    }
    if (reconciled.duplicateIndices.length > 0) {
      this.logger.debug({ duplicateIndices: reconciled.duplicateIndices }, 'Duplicate prediction indices, first match kept')
    }
  }
}
