/**
 * Shared typed service errors.
 *
 * Each subclass carries a fixed `code` so callers (the CLI, the pipeline)
 * can dispatch with instanceof instead of matching on messages.
 */

export class ServiceError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(message: string, opts: { code: string; details?: Record<string, unknown> }) {
    super(message)
    this.name = this.constructor.name
    this.code = opts.code
    this.details = opts.details
  }
}

export class InvalidInputError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'INVALID_INPUT', details })
  }
}

/**
 * A progress write did not complete. Never swallowed: losing an
 * acknowledgment would let a completed record be counted twice or not at all.
 */
export class ProgressStoreError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { code: 'PROGRESS_STORE_WRITE', details })
  }
}

export class RowCountMismatchError extends ServiceError {
  readonly expectedRows: number
  readonly actualRows: number

  constructor(path: string, expectedRows: number, actualRows: number) {
    super(
      `Row count mismatch for ${path}: input had ${expectedRows} rows, output has ${actualRows}`,
      { code: 'ROW_COUNT_MISMATCH', details: { path, expectedRows, actualRows } }
    )
    this.expectedRows = expectedRows
    this.actualRows = actualRows
  }
}
