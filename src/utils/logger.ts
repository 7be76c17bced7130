// Constants

const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
} as const

// Types

export type LogLevel = keyof typeof LOG_LEVELS

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(scope: string): Logger
}

// Helpers

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS
}

// Read per call so tests and the CLI can change LOG_LEVEL after import.
function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase()

  return isLogLevel(raw) ? raw : 'info'
}

function formatEntry(level: LogLevel, scope: string | null, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString()

  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify({ timestamp, level, ...(scope && { scope }), message, ...(context && { context }) })
  }

  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp
  const prefix = scope ? `[${scope}] ` : ''
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : ''

  return `${time} ${level.toUpperCase().padEnd(5)} ${prefix}${message}${suffix}`
}

function write(level: LogLevel, scope: string | null, message: string, context?: LogContext): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel()]) return

  const line = formatEntry(level, scope, message, context)

  if (level === 'error') console.error(line)
  else if (level === 'warn') console.warn(line)
  else console.log(line)
}

// Main Function

export function createLogger(scope: string | null = null): Logger {
  return {
    debug: (message, context) => write('debug', scope, message, context),
    info: (message, context) => write('info', scope, message, context),
    warn: (message, context) => write('warn', scope, message, context),
    error: (message, context) => write('error', scope, message, context),
    child: childScope => createLogger(scope ? `${scope}:${childScope}` : childScope)
  }
}

export const logger = createLogger()
