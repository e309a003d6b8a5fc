/**
 * Structured logging.
 *
 * Emits one JSON line per entry with:
 * - timestamp, level, event name, plus any fields passed by the caller
 *
 * Lines go to stdout unless a sink is supplied. The level threshold comes
 * from LATTICE_LOG_LEVEL.
 */

import { resolveSettings, type LogLevel } from '@lattice-kit/config'

export type EntryLevel = Exclude<LogLevel, 'silent'>

export type LogFields = Readonly<Record<string, unknown>>

export type LogSink = (line: string) => void

export interface Logger {
  readonly level: LogLevel
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** A logger whose entries all carry `bindings`. */
  child(bindings: LogFields): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  bindings?: LogFields
  clock?: () => Date
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveSettings().logLevel
  const sink = options.sink ?? stdoutSink
  const bindings = options.bindings ?? {}
  const clock = options.clock ?? (() => new Date())

  const emit = (entryLevel: EntryLevel, event: string, fields: LogFields = {}): void => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return
    const entry = {
      ts: clock().toISOString(),
      level: entryLevel,
      event,
      ...bindings,
      ...fields,
    }
    sink(JSON.stringify(entry, replacer))
  }

  return {
    level,
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (extra) => createLogger({ level, sink, clock, bindings: { ...bindings, ...extra } }),
  }
}

// Errors and bigints do not survive JSON.stringify on their own.
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message }
  if (typeof value === 'bigint') return value.toString()
  return value
}

let shared: Logger | null = null

/** The package-wide logger, created on first use. */
export function getLogger(): Logger {
  shared ??= createLogger()
  return shared
}

/** Replace the package-wide logger (tests, embedding hosts). Pass null to reset. */
export function setLogger(logger: Logger | null): void {
  shared = logger
}
