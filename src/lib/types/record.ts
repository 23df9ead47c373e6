/**
 * ClassificationRecord — one row awaiting a label.
 *
 * Identity is (sourceId, recordId); recordId is the 0-based row index
 * within the source table and is never reused for another row.
 */

export type RecordFields = Record<string, string>

export interface ClassificationRecord {
  sourceId: string
  recordId: number
  fields: RecordFields
}

