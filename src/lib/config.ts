/**
 * Pipeline Configuration
 *
 * Batch, pacing, rate-window and table settings read from the environment.
 * LLM provider settings live in ./llm/config.
 */

import { z } from 'zod'
import { InvalidInputError } from './errors'

export interface FieldSpec {
  /** Key in the record's field map (e.g. "guardian") */
  key: string
  /** CSV column the value is read from (e.g. "Guardian's Name") */
  column: string
  /** Label used for the field in the prompt (e.g. "Guardian") */
  promptLabel: string
}

export interface RateConfig {
  maxCalls: number
  maxUnits: number
  windowMs: number
  pollIntervalMs: number
  /** Units assumed for a call before its real usage is known */
  estimatedUnits: number
}

export interface PipelineConfig {
  batchSize: number
  maxParallel: number
  maxRetries: number
  baseDelayMs: number
  minBatchDurationMs: number
  rate: RateConfig
  progressDbPath: string
  labelColumn: string
  fields: FieldSpec[]
}

export const DEFAULT_FIELD_COLUMNS = "name=Name;guardian=Guardian's Name;house=House Name"

const envSchema = z.object({
  CLASSIFY_BATCH_SIZE: z.coerce.number().int().min(1).default(25),
  CLASSIFY_MAX_PARALLEL: z.coerce.number().int().min(1).default(1),
  CLASSIFY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  CLASSIFY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  CLASSIFY_MIN_BATCH_MS: z.coerce.number().int().min(0).default(1500),
  RATE_MAX_CALLS: z.coerce.number().int().min(1).default(40),
  RATE_MAX_UNITS: z.coerce.number().int().min(1).default(90_000),
  RATE_WINDOW_MS: z.coerce.number().int().min(1).default(60_000),
  RATE_POLL_MS: z.coerce.number().int().min(1).default(500),
  RATE_ESTIMATED_UNITS: z.coerce.number().int().min(0).default(1000),
  PROGRESS_DB: z.string().min(1).default('progress.db'),
  LABEL_COLUMN: z.string().min(1).default('Religion'),
  FIELD_COLUMNS: z.string().min(1).default(DEFAULT_FIELD_COLUMNS),
})

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

/**
 * Parses "key=Column;key2=Column 2" into field specs.
 *
 * @throws InvalidInputError on an empty or malformed entry
 */
export function parseFieldColumns(raw: string): FieldSpec[] {
  const fields = raw
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const eq = entry.indexOf('=')
      const key = eq > 0 ? entry.slice(0, eq).trim() : ''
      const column = eq > 0 ? entry.slice(eq + 1).trim() : ''
      if (!key || !column) {
        throw new InvalidInputError(`Invalid field column entry: "${entry}" (expected key=Column)`)
      }
      return { key, column, promptLabel: capitalize(key) }
    })

  if (fields.length === 0) {
    throw new InvalidInputError('FIELD_COLUMNS must name at least one field')
  }
  return fields
}

/**
 * Builds the pipeline config from env values.
 *
 * @throws InvalidInputError listing every invalid variable
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new InvalidInputError('Invalid pipeline configuration', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    })
  }

  const parsed = result.data
  return {
    batchSize: parsed.CLASSIFY_BATCH_SIZE,
    maxParallel: parsed.CLASSIFY_MAX_PARALLEL,
    maxRetries: parsed.CLASSIFY_MAX_RETRIES,
    baseDelayMs: parsed.CLASSIFY_BASE_DELAY_MS,
    minBatchDurationMs: parsed.CLASSIFY_MIN_BATCH_MS,
    rate: {
      maxCalls: parsed.RATE_MAX_CALLS,
      maxUnits: parsed.RATE_MAX_UNITS,
      windowMs: parsed.RATE_WINDOW_MS,
      pollIntervalMs: parsed.RATE_POLL_MS,
      estimatedUnits: parsed.RATE_ESTIMATED_UNITS,
    },
    progressDbPath: parsed.PROGRESS_DB,
    labelColumn: parsed.LABEL_COLUMN,
    fields: parseFieldColumns(parsed.FIELD_COLUMNS),
  }
}
