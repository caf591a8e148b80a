/**
 * Simple structured logger for server-side logging
 * Uses console with structured JSON output, one entry per line.
 * LOG_LEVEL selects the minimum level (debug | info | warn | error | silent).
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

type LogContext = Record<string, unknown>

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLevelName(value: string): value is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL ?? 'info').toLowerCase()
  return isLevelName(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info
}

function serializeError(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack }
  }
  return value
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_RANK[level] < threshold()) return

  const timestamp = new Date().toISOString()
  const logEntry: Record<string, unknown> = {
    timestamp,
    level,
    message,
  }
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      logEntry[key] = serializeError(value)
    }
  }

  const output = JSON.stringify(logEntry)

  switch (level) {
    case 'error':
      console.error(output)
      break
    case 'warn':
      console.warn(output)
      break
    case 'debug':
      console.debug(output)
      break
    case 'info':
    default:
      console.log(output)
  }
}

export const logger = {
  log,
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext) => log('error', message, context),
  debug: (message: string, context?: LogContext) => log('debug', message, context),
}
