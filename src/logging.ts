/**
 * Logger built from the driver's logging configuration
 */

import type { LoggingConfig, LogLevel } from './types'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export const LOG_LEVELS: readonly string[] = Object.keys(LEVEL_PRIORITY)

export interface Logger {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
  isEnabled(level: LogLevel): boolean
}

function consoleSink(level: LogLevel, message: string): void {
  switch (level) {
    case 'error':
      console.error(`${level}: ${message}`)
      break
    case 'warn':
      console.warn(`${level}: ${message}`)
      break
    default:
      console.log(`${level}: ${message}`)
  }
}

/**
 * Create a logger that forwards messages at or above the configured level.
 * Without a config the logger discards everything.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const threshold = config ? LEVEL_PRIORITY[config.level] : -1
  const sink = config?.logger ?? consoleSink

  const isEnabled = (level: LogLevel): boolean => LEVEL_PRIORITY[level] <= threshold
  const emit = (level: LogLevel, message: string): void => {
    if (isEnabled(level)) {
      sink(level, message)
    }
  }

  return {
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message),
    isEnabled,
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}
