/**
 * File Pipeline
 *
 * Reads a CSV table, labels every row through the BatchOrchestrator, writes
 * the table back with a label column and then re-reads the output to
 * check that its row count equals the input's. A mismatch is fatal.
 *
 * classifyDirectory() walks a directory tree of CSV files and mirrors it
 * into an output directory, one source per file.
 */

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises'
import { dirname, join, sep } from 'path'
import type { Logger } from 'pino'
import { createLogger } from '../logger'
import { RowCountMismatchError, ServiceError } from '../errors'
import { FALLBACK_LABEL } from '../labels'
import type { FieldSpec } from '../config'
import { realClock } from '../llm'
import type { Clock } from '../llm'
import type { ProgressStore } from '../progress/store'
import type { ClassificationRecord } from '../types/record'
import { createRunStats } from './orchestrator'
import type { BatchOrchestrator, RunStats } from './orchestrator'
import { buildProgressReport, formatProgressReport } from './progress-report'

export interface CsvTable {
  header: string[]
  rows: string[][]
}

export interface FilePipelineOptions {
  orchestrator: Pick<BatchOrchestrator, 'run'>
  store: ProgressStore
  fields: FieldSpec[]
  labelColumn: string
  clock?: Clock
  logger?: Logger
}

export interface ClassifyFileInput {
  inputPath: string
  outputPath: string
  /** Defaults to inputPath */
  sourceId?: string
  signal?: AbortSignal
  stats?: RunStats
}

export interface FileResult {
  sourceId: string
  inputPath: string
  outputPath: string
  rows: number
  /** False when the run was interrupted and no output was written */
  written: boolean
  stats: RunStats
}

export interface ClassifyDirectoryInput {
  inputDir: string
  outputDir: string
  signal?: AbortSignal
  /** Total records across the campaign, for ETA reporting */
  expectedTotal?: number
}

export interface DirectoryResult {
  files: FileResult[]
  stats: RunStats
  interrupted: boolean
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  )
}

/**
 * Parses CSV text with a header row. Short rows are padded with empty cells.
 *
 * @throws ServiceError (CSV_ROW_TOO_WIDE) if a row has more cells than the header
 */
export function parseCsv(text: string): CsvTable {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  })
  if (!isStringMatrix(parsed)) {
    throw new ServiceError('CSV parser returned an unexpected shape', { code: 'CSV_PARSE' })
  }

  const [header = [], ...rows] = parsed
  rows.forEach((row, index) => {
    if (row.length > header.length) {
      throw new ServiceError(`CSV row ${index + 1} has ${row.length} cells, header has ${header.length}`, {
        code: 'CSV_ROW_TOO_WIDE',
        details: { row: index + 1, cells: row.length, columns: header.length },
      })
    }
  })
  return {
    header,
    rows: rows.map((row) => header.map((_, index) => row[index] ?? '')),
  }
}

export function formatCsv(table: CsvTable): string {
  return stringify([table.header, ...table.rows])
}

/**
 * Returns the table with `labelColumn` set from `labelFor(rowIndex)`,
 * replacing an existing column of that name or appending a new one.
 */
export function withLabelColumn(table: CsvTable, labelColumn: string, labelFor: (rowIndex: number) => string): CsvTable {
  const existing = table.header.indexOf(labelColumn)
  if (existing >= 0) {
    return {
      header: table.header,
      rows: table.rows.map((row, rowIndex) =>
        row.map((cell, index) => (index === existing ? labelFor(rowIndex) : cell))
      ),
    }
  }
  return {
    header: [...table.header, labelColumn],
    rows: table.rows.map((row, rowIndex) => [...row, labelFor(rowIndex)]),
  }
}

/**
 * Recursively lists *.csv files below `dir`, as sorted relative paths.
 */
export async function listCsvFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { recursive: true })
  const files: string[] = []
  for (const entry of entries.filter((name) => name.toLowerCase().endsWith('.csv')).sort()) {
    if ((await stat(join(dir, entry))).isFile()) files.push(entry)
  }
  return files
}

export class FilePipeline {
  private readonly orchestrator: Pick<BatchOrchestrator, 'run'>
  private readonly store: ProgressStore
  private readonly fields: FieldSpec[]
  private readonly labelColumn: string
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(options: FilePipelineOptions) {
    this.orchestrator = options.orchestrator
    this.store = options.store
    this.fields = options.fields
    this.labelColumn = options.labelColumn
    this.clock = options.clock ?? realClock
    this.logger = options.logger ?? createLogger('file-pipeline')
  }

  /**
   * Labels one CSV file.
   *
   * @throws RowCountMismatchError if the written file's row count differs from the input's
   * @throws ProgressStoreError if progress cannot be persisted
   */
  async classifyFile(input: ClassifyFileInput): Promise<FileResult> {
    const sourceId = input.sourceId ?? input.inputPath
    const table = parseCsv(await readFile(input.inputPath, 'utf8'))
    const records = this.toRecords(sourceId, table)

    this.logger.info({ sourceId, rows: table.rows.length }, 'Processing file')

    const result = await this.orchestrator.run(sourceId, records, {
      signal: input.signal,
      stats: input.stats,
    })

    const base = {
      sourceId,
      inputPath: input.inputPath,
      outputPath: input.outputPath,
      rows: table.rows.length,
      stats: result.stats,
    }
    if (result.interrupted) {
      this.logger.warn({ sourceId }, 'File not written, run was interrupted')
      return { ...base, written: false }
    }
    if (result.labels.size !== table.rows.length) {
      throw new ServiceError(
        `Label coverage incomplete for ${sourceId}: ${result.labels.size} of ${table.rows.length} rows`,
        { code: 'COVERAGE_INCOMPLETE', details: { sourceId } }
      )
    }

    const output = withLabelColumn(table, this.labelColumn, (rowIndex) => result.labels.get(rowIndex) ?? FALLBACK_LABEL)
    await mkdir(dirname(input.outputPath), { recursive: true })
    await writeFile(input.outputPath, formatCsv(output), 'utf8')

    const written = parseCsv(await readFile(input.outputPath, 'utf8'))
    if (written.rows.length !== table.rows.length) {
      throw new RowCountMismatchError(input.outputPath, table.rows.length, written.rows.length)
    }

    this.logger.info({ sourceId, rows: table.rows.length, outputPath: input.outputPath }, 'Completed file')
    return { ...base, written: true }
  }

  /**
   * Labels every CSV file below inputDir, one after another, mirroring
   * relative paths into outputDir. The relative path is the sourceId.
   */
  async classifyDirectory(input: ClassifyDirectoryInput): Promise<DirectoryResult> {
    const files = await listCsvFiles(input.inputDir)
    const stats = createRunStats(this.clock.now())
    const results: FileResult[] = []

    this.logger.info({ files: files.length, inputDir: input.inputDir, outputDir: input.outputDir }, 'Found CSV files')

    for (const [index, relativePath] of files.entries()) {
      const result = await this.classifyFile({
        inputPath: join(input.inputDir, relativePath),
        outputPath: join(input.outputDir, relativePath),
        sourceId: relativePath.split(sep).join('/'),
        signal: input.signal,
        stats,
      })
      results.push(result)

      const report = buildProgressReport(this.store.stats(), stats, this.clock.now(), input.expectedTotal)
      this.logger.info({ file: relativePath, fileIndex: index + 1, files: files.length, ...report }, 'Progress')
      this.logger.debug(formatProgressReport(report).join('\n'))

      if (!result.written) {
        return { files: results, stats, interrupted: true }
      }
    }

    return { files: results, stats, interrupted: false }
  }

  private toRecords(sourceId: string, table: CsvTable): ClassificationRecord[] {
    const columnIndex = new Map(table.header.map((column, index) => [column, index]))
    const missing = this.fields.filter((field) => !columnIndex.has(field.column)).map((field) => field.column)
    if (missing.length > 0 && table.rows.length > 0) {
      this.logger.warn({ sourceId, missing }, 'Field columns missing from table, using empty values')
    }

    return table.rows.map((row, recordId) => {
      const fields: Record<string, string> = {}
      for (const field of this.fields) {
        const index = columnIndex.get(field.column)
        fields[field.key] = index === undefined ? '' : (row[index] ?? '').trim()
      }
      return { sourceId, recordId, fields }
    })
  }
}
