import { describe, it, expect } from 'vitest'
import { parseCliArgs } from '../lib/cli-args'
import { InvalidInputError } from '../lib/errors'

describe('parseCliArgs', () => {
  it('parses classify with its paths', () => {
    expect(parseCliArgs(['classify', 'in.csv', 'out.csv'])).toEqual({
      command: { name: 'classify', inputPath: 'in.csv', outputPath: 'out.csv' },
      env: {},
      sourceId: undefined,
      expectedTotal: undefined,
    })
  })

  it('parses classify-dir with flags in any position', () => {
    const args = parseCliArgs(['--batch-size', '10', 'classify-dir', 'data/in', '--db', 'run.db', 'data/out'])
    expect(args.command).toEqual({ name: 'classify-dir', inputDir: 'data/in', outputDir: 'data/out' })
    expect(args.env).toEqual({ CLASSIFY_BATCH_SIZE: '10', PROGRESS_DB: 'run.db' })
  })

  it('reads --source-id and --expected-total', () => {
    const args = parseCliArgs(['classify', 'a.csv', 'b.csv', '--source-id', 'ward-3', '--expected-total', '5000'])
    expect(args.sourceId).toBe('ward-3')
    expect(args.expectedTotal).toBe(5000)
  })

  it('parses stats', () => {
    expect(parseCliArgs(['stats']).command).toEqual({ name: 'stats' })
  })

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['classify', 'a.csv', 'b.csv', '--db'])).toThrow('Missing value for --db')
    expect(() => parseCliArgs(['stats', '--db', '--batch-size', '3'])).toThrow('Missing value for --db')
  })

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['stats', '--verbose', 'yes'])).toThrow('Unknown flag: --verbose')
  })

  it('rejects a bad expected total', () => {
    expect(() => parseCliArgs(['stats', '--expected-total', '-4'])).toThrow('Invalid --expected-total: -4')
  })

  it('rejects missing or incomplete commands', () => {
    expect(() => parseCliArgs([])).toThrow('Invalid command: (none)')
    expect(() => parseCliArgs(['classify', 'only-input.csv'])).toThrow('Invalid command: classify only-input.csv')
    expect(() => parseCliArgs(['label'])).toThrow(InvalidInputError)
  })
})
