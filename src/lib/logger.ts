/**
 * Logging
 *
 * One pino root logger; components take a named child so log lines carry
 * their origin. Every component also accepts an injected Logger.
 */

import pino from 'pino'
import type { Logger } from 'pino'

const rootLogger = pino({
  name: 'batch-label',
  level: process.env.LOG_LEVEL?.trim() || 'info',
})

export function createLogger(component: string): Logger {
  return rootLogger.child({ component })
}

export type { Logger }
