import { describe, it, expect } from 'vitest'
import {
  ServiceError,
  InvalidInputError,
  ProgressStoreError,
  RowCountMismatchError,
} from '../lib/errors'

describe('ServiceError (base)', () => {
  it('sets code, message, and name', () => {
    const err = new ServiceError('something broke', { code: 'TEST_CODE' })
    expect(err.message).toBe('something broke')
    expect(err.code).toBe('TEST_CODE')
    expect(err.name).toBe('ServiceError')
    expect(err.details).toBeUndefined()
    expect(err).toBeInstanceOf(Error)
  })

  it('accepts optional details', () => {
    const err = new ServiceError('with details', { code: 'X', details: { foo: 'bar' } })
    expect(err.details).toEqual({ foo: 'bar' })
  })
})

describe('InvalidInputError', () => {
  it('has code INVALID_INPUT', () => {
    const err = new InvalidInputError('bad flag', { flag: '--batch-size' })
    expect(err.code).toBe('INVALID_INPUT')
    expect(err.name).toBe('InvalidInputError')
    expect(err.details).toEqual({ flag: '--batch-size' })
    expect(err).toBeInstanceOf(ServiceError)
  })
})

describe('ProgressStoreError', () => {
  it('has code PROGRESS_STORE_WRITE', () => {
    const err = new ProgressStoreError('Progress write failed: disk full')
    expect(err.code).toBe('PROGRESS_STORE_WRITE')
    expect(err.name).toBe('ProgressStoreError')
    expect(err).toBeInstanceOf(ServiceError)
  })
})

describe('RowCountMismatchError', () => {
  it('reports both counts', () => {
    const err = new RowCountMismatchError('out/ward.csv', 1000, 999)
    expect(err.code).toBe('ROW_COUNT_MISMATCH')
    expect(err.message).toBe('Row count mismatch for out/ward.csv: input had 1000 rows, output has 999')
    expect(err.expectedRows).toBe(1000)
    expect(err.actualRows).toBe(999)
    expect(err.details).toEqual({ path: 'out/ward.csv', expectedRows: 1000, actualRows: 999 })
  })
})
