import 'dotenv/config'
import { loadPipelineConfig } from './lib/config'
import { InvalidInputError, ServiceError } from './lib/errors'
import { getLlmMode, getProvider, requireApiKeyForRealMode } from './lib/llm'
import { createLogger } from './lib/logger'
import { ProgressStore } from './lib/progress/store'
import { parseCliArgs, USAGE } from './lib/cli-args'
import { createPipeline } from './lib/services/pipeline'
import { buildProgressReport, formatProgressReport } from './lib/services/progress-report'

const logger = createLogger('cli')

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2))
  const config = loadPipelineConfig({ ...process.env, ...args.env })

  if (args.command.name === 'stats') {
    const store = ProgressStore.open(config.progressDbPath)
    try {
      const stats = store.stats()
      process.stdout.write(`${JSON.stringify(stats)}\n`)
    } finally {
      store.close()
    }
    return
  }

  requireApiKeyForRealMode(getProvider())
  logger.info(
    { mode: getLlmMode(), provider: getProvider(), batchSize: config.batchSize, maxParallel: config.maxParallel },
    'Starting classification'
  )

  const controller = new AbortController()
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current chunk')
    controller.abort()
  })

  const pipeline = createPipeline(config)
  try {
    if (args.command.name === 'classify') {
      const result = await pipeline.files.classifyFile({
        inputPath: args.command.inputPath,
        outputPath: args.command.outputPath,
        sourceId: args.sourceId,
        signal: controller.signal,
      })
      const report = buildProgressReport(pipeline.store.stats(), result.stats, Date.now(), args.expectedTotal)
      process.stdout.write(`${formatProgressReport(report).join('\n')}\n`)
      if (!result.written) process.exitCode = 130
      return
    }

    const result = await pipeline.files.classifyDirectory({
      inputDir: args.command.inputDir,
      outputDir: args.command.outputDir,
      signal: controller.signal,
      expectedTotal: args.expectedTotal,
    })
    const report = buildProgressReport(pipeline.store.stats(), result.stats, Date.now(), args.expectedTotal)
    process.stdout.write(`Files: ${result.files.length}\n${formatProgressReport(report).join('\n')}\n`)
    if (result.interrupted) process.exitCode = 130
  } finally {
    pipeline.close()
  }
}

main().catch((err: unknown) => {
  if (err instanceof InvalidInputError) {
    logger.error({ code: err.code, details: err.details }, err.message)
    process.stderr.write(`${USAGE}\n`)
  } else if (err instanceof ServiceError) {
    logger.error({ code: err.code, details: err.details }, err.message)
  } else {
    logger.error({ err }, 'Classification run failed')
  }
  process.exitCode = 1
})
