export type LogLevel = "info" | "success" | "warn" | "error"

export interface LogContext {
  component?: string
  step?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  info: (message: string, context?: LogContext) => void
  success: (message: string, context?: LogContext) => void
  warn: (message: string, context?: LogContext) => void
  error: (message: string, context?: LogContext) => void
  /** Empty info line, used to space out message blocks */
  blank: () => void
}

export const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[0;31m",
  green: "\x1b[0;32m",
  yellow: "\x1b[1;33m",
  blue: "\x1b[0;34m",
} as const

const LEVEL_COLORS: Record<LogLevel, string> = {
  info: COLORS.blue,
  success: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
}

/**
 * Render an entry as a single console line: `[LEVEL] message`,
 * wrapped in the level's ANSI color when `color` is set.
 */
export function formatEntry(entry: LogEntry, color: boolean): string {
  const line = `[${entry.level.toUpperCase()}] ${entry.message}`
  return color ? `${LEVEL_COLORS[entry.level]}${line}${COLORS.reset}` : line
}

export interface ConsoleSinkOptions {
  color?: boolean
  write?: (line: string) => void
}

export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const color = options.color ?? true
  const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`))
  return entry => write(formatEntry(entry, color))
}

/** Collects entries in memory; used by tests and by callers that render later */
export function createMemorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const sink = (entry: LogEntry) => {
    entries.push(entry)
  }
  return Object.assign(sink, { entries })
}

export function createLogger(sink: LogSink = createConsoleSink()): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    sink({
      level,
      message,
      context,
      timestamp: new Date().toISOString(),
    })
  }

  return {
    info: (message, context) => log("info", message, context),
    success: (message, context) => log("success", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    blank: () => log("info", ""),
  }
}
