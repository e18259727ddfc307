/**
 * Structured logging.
 *
 * Emits one JSON line per event to stdout with:
 * - timestamp, level, event name, plus caller-supplied fields
 *
 * Estimators take a `Logger` and default to `silentLogger`, so library
 * consumers opt in to output explicitly.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogFields = Record<string, string | number | boolean | null>

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
}

export interface JsonLoggerOptions {
  /** Minimum level written. Defaults to `resolveLogLevel()`. */
  level?: LogLevel
  /** Line sink. Defaults to process.stdout. */
  write?: (line: string) => void
  /** Clock, for deterministic timestamps in tests. */
  now?: () => Date
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Resolve the default level: SYLVA_LOG_LEVEL env override > 'info'. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env['SYLVA_LOG_LEVEL']?.trim().toLowerCase()
  if (raw !== undefined && isLogLevel(raw)) return raw
  return 'info'
}

export function createJsonLogger(options: JsonLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? resolveLogLevel()]
  const write = options.write ?? ((line: string) => {
    process.stdout.write(line)
  })
  const now = options.now ?? (() => new Date())

  const emit = (level: Exclude<LogLevel, 'silent'>, event: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) return
    const entry = {
      ts: now().toISOString(),
      level,
      event,
      ...fields,
    }
    write(JSON.stringify(entry) + '\n')
  }

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
  }
}

const noop = (): void => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
}
