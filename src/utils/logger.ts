/**
 * Logger Utility
 *
 * pino with pretty-print in development, silent under tests unless
 * LOG_LEVEL says otherwise.
 */

import pino from 'pino'

const env = process.env.NODE_ENV
const isTest = env === 'test' || process.env.VITEST !== undefined
const isDev = env !== 'production' && !isTest

export type Logger = pino.Logger

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): Logger {
  return baseLogger
}

