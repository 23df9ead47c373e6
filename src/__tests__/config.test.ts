import { describe, it, expect } from 'vitest'
import { DEFAULT_FIELD_COLUMNS, loadPipelineConfig, parseFieldColumns } from '../lib/config'
import { InvalidInputError } from '../lib/errors'

describe('parseFieldColumns', () => {
  it('parses the default mapping', () => {
    expect(parseFieldColumns(DEFAULT_FIELD_COLUMNS)).toEqual([
      { key: 'name', column: 'Name', promptLabel: 'Name' },
      { key: 'guardian', column: "Guardian's Name", promptLabel: 'Guardian' },
      { key: 'house', column: 'House Name', promptLabel: 'House' },
    ])
  })

  it('trims entries and skips empty ones', () => {
    expect(parseFieldColumns(' name = Voter Name ;; ')).toEqual([
      { key: 'name', column: 'Voter Name', promptLabel: 'Name' },
    ])
  })

  it('rejects an entry without a column', () => {
    expect(() => parseFieldColumns('name=')).toThrow('Invalid field column entry: "name=" (expected key=Column)')
  })

  it('rejects an empty mapping', () => {
    expect(() => parseFieldColumns(' ; ')).toThrow(InvalidInputError)
  })
})

describe('loadPipelineConfig', () => {
  it('applies defaults', () => {
    const config = loadPipelineConfig({})
    expect(config).toMatchObject({
      batchSize: 25,
      maxParallel: 1,
      maxRetries: 3,
      baseDelayMs: 2000,
      minBatchDurationMs: 1500,
      rate: { maxCalls: 40, maxUnits: 90_000, windowMs: 60_000, pollIntervalMs: 500, estimatedUnits: 1000 },
      progressDbPath: 'progress.db',
      labelColumn: 'Religion',
    })
    expect(config.fields.map((field) => field.key)).toEqual(['name', 'guardian', 'house'])
  })

  it('reads overrides from env strings', () => {
    const config = loadPipelineConfig({
      CLASSIFY_BATCH_SIZE: '10',
      CLASSIFY_MAX_PARALLEL: '4',
      CLASSIFY_MAX_RETRIES: '0',
      RATE_MAX_CALLS: '15',
      PROGRESS_DB: 'data/progress.db',
      LABEL_COLUMN: 'Community',
      FIELD_COLUMNS: 'name=Full Name',
    })
    expect(config.batchSize).toBe(10)
    expect(config.maxParallel).toBe(4)
    expect(config.maxRetries).toBe(0)
    expect(config.rate.maxCalls).toBe(15)
    expect(config.progressDbPath).toBe('data/progress.db')
    expect(config.labelColumn).toBe('Community')
    expect(config.fields).toEqual([{ key: 'name', column: 'Full Name', promptLabel: 'Name' }])
  })

  it('lists every invalid variable', () => {
    try {
      loadPipelineConfig({ CLASSIFY_BATCH_SIZE: '0', RATE_WINDOW_MS: 'soon' })
      expect.fail('should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError)
      const issues = (err as InvalidInputError).details?.issues
      expect(Array.isArray(issues)).toBe(true)
      expect(String(issues)).toContain('CLASSIFY_BATCH_SIZE')
      expect(String(issues)).toContain('RATE_WINDOW_MS')
    }
  })
})
