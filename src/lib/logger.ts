/**
 * Console logger. The minimum level comes from the library configuration.
 */

import { getConfig, type LogLevel } from './config'

type EntryLevel = Exclude<LogLevel, 'silent'>

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export function formatLogEntry(level: EntryLevel, scope: string, message: string, context?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString()
  let entry = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${scope}] ${message}`
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`
  }
  return entry
}

function consoleMethod(level: EntryLevel): typeof console.log {
  switch (level) {
    case 'debug':
      return console.debug
    case 'info':
      return console.info
    case 'warn':
      return console.warn
    case 'error':
      return console.error
  }
}

/** Create a logger that prefixes entries with `scope`. */
export function createLogger(scope: string): Logger {
  function log(level: EntryLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[getConfig().logLevel]) return
    consoleMethod(level)(formatLogEntry(level, scope, message, context))
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  }
}
