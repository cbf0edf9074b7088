/**
 * Logger
 *
 * Structured logging with levels and inherited context. The console
 * implementation writes one JSON object per line; `nullLogger` is the default
 * everywhere so library calls stay silent unless a caller opts in.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = {
  component?: string
  userId?: string
  [key: string]: unknown
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void

  /** Creates a child logger with inherited context. */
  child(context: LogContext): Logger
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export type LogSink = (level: LogLevel, line: string) => void

export type ConsoleLoggerOptions = {
  level?: LogLevel
  context?: LogContext
  /** Where formatted lines go; defaults to the matching console method */
  sink?: LogSink
  now?: () => Date
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'debug':
      console.debug(line)
      break
    case 'info':
      console.info(line)
      break
    case 'warn':
      console.warn(line)
      break
    case 'error':
      console.error(line)
      break
  }
}

function describeError(error: unknown): LogContext['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return error === undefined ? undefined : { message: String(error) }
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info'
  const baseContext = options.context ?? {}
  const sink = options.sink ?? consoleSink
  const now = options.now ?? (() => new Date())

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (levelPriority[level] < levelPriority[minLevel]) return

    const entry = {
      timestamp: now().toISOString(),
      level,
      message,
      ...baseContext,
      ...context,
    }
    sink(level, JSON.stringify(entry))
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, { ...context, error: describeError(error) }),
    child: (context) =>
      createConsoleLogger({ level: minLevel, context: { ...baseContext, ...context }, sink, now }),
  }
}

export const nullLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return nullLogger
  },
}
