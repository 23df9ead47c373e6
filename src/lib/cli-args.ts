/**
 * CLI argument parsing
 *
 * Commands:
 *   classify <input.csv> <output.csv>
 *   classify-dir <inputDir> <outputDir>
 *   stats
 *
 * Flags map onto the env variables read by loadPipelineConfig, so the same
 * validation applies to both.
 */

import { InvalidInputError } from './errors'

export type CliCommand =
  | { name: 'classify'; inputPath: string; outputPath: string }
  | { name: 'classify-dir'; inputDir: string; outputDir: string }
  | { name: 'stats' }

export interface CliArgs {
  command: CliCommand
  /** Env overrides derived from flags */
  env: Record<string, string>
  sourceId?: string
  expectedTotal?: number
}

const FLAG_ENV: Record<string, string> = {
  '--db': 'PROGRESS_DB',
  '--batch-size': 'CLASSIFY_BATCH_SIZE',
  '--max-parallel': 'CLASSIFY_MAX_PARALLEL',
  '--max-retries': 'CLASSIFY_MAX_RETRIES',
  '--min-batch-ms': 'CLASSIFY_MIN_BATCH_MS',
  '--label-column': 'LABEL_COLUMN',
}

export const USAGE = [
  'Usage:',
  '  batch-label classify <input.csv> <output.csv> [--source-id <id>]',
  '  batch-label classify-dir <inputDir> <outputDir> [--expected-total <n>]',
  '  batch-label stats',
  '',
  'Flags: --db <path> --batch-size <n> --max-parallel <n> --max-retries <n> --min-batch-ms <ms> --label-column <name>',
].join('\n')

/**
 * @throws InvalidInputError on unknown commands, unknown flags or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = []
  const env: Record<string, string> = {}
  let sourceId: string | undefined
  let expectedTotal: number | undefined

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positional.push(arg)
      continue
    }

    const value = argv[i + 1]
    if (value === undefined || value.startsWith('--')) {
      throw new InvalidInputError(`Missing value for ${arg}`)
    }
    i += 1

    if (arg === '--source-id') {
      sourceId = value
      continue
    }
    if (arg === '--expected-total') {
      const parsed = parseInt(value, 10)
      if (isNaN(parsed) || parsed < 0) {
        throw new InvalidInputError(`Invalid --expected-total: ${value}`)
      }
      expectedTotal = parsed
      continue
    }
    const envKey = FLAG_ENV[arg]
    if (!envKey) {
      throw new InvalidInputError(`Unknown flag: ${arg}`)
    }
    env[envKey] = value
  }

  const [name, first, second] = positional
  let command: CliCommand
  if (name === 'classify' && first && second) {
    command = { name, inputPath: first, outputPath: second }
  } else if (name === 'classify-dir' && first && second) {
    command = { name, inputDir: first, outputDir: second }
  } else if (name === 'stats') {
    command = { name }
  } else {
    throw new InvalidInputError(`Invalid command: ${positional.join(' ') || '(none)'}`)
  }

  return { command, env, sourceId, expectedTotal }
}
