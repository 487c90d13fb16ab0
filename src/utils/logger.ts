/**
 * Structured JSON logger for all output.
 * NEVER use console.log directly - use this logger.
 *
 * Components receive a Logger through their context; the module-level
 * `logger` is the fallback for code that runs before config is loaded.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  /** Derive a logger that stamps `bindings` on every entry. */
  child(bindings: LogContext): Logger
}

export interface LoggerOptions {
  /** Without a level, LOG_LEVEL is read on every write (falls back to info). */
  level?: LogLevel
  bindings?: LogContext
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function envLogLevel(): LogLevel {
  const value = process.env.LOG_LEVEL
  return isLogLevel(value) ? value : 'info'
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  }
  return JSON.stringify(entry)
}

function write(level: LogLevel, line: string): void {
  switch (level) {
    case 'error':
      process.stderr.write(line + '\n')
      break
    default:
      process.stdout.write(line + '\n')
  }
}

/**
 * Create a logger instance.
 * Entries below `level` are dropped; `bindings` are merged under the per-call context.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const bindings = options.bindings ?? {}

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[options.level ?? envLogLevel()]) return
    write(level, formatLog(level, message, { ...bindings, ...context }))
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
    child: (childBindings) =>
      createLogger({ level: options.level, bindings: { ...bindings, ...childBindings } }),
  }
}

/**
 * Error message extraction shared by every catch block.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// Level left open: .env is loaded after this module is evaluated
export const logger: Logger = createLogger()
