/**
 * Structured console logging.
 *
 * Loggers are constructed per session and handed to the components that need
 * them; `child()` derives a logger for a sub-component that shares the level,
 * colour setting and the buffer of recent entries.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m'
}

const RESET_COLOR = '\x1b[0m'

export interface LogEntry {
  timestamp: string
  level: Exclude<LogLevel, 'silent'>
  context: string
  message: string
  meta?: unknown
}

export interface LoggerOptions {
  level?: LogLevel
  colorize?: boolean
  /** How many recent entries to keep in memory */
  capacity?: number
}

export class LogBuffer {
  private readonly entries: LogEntry[] = []

  constructor(private readonly capacity: number) {}

  push(entry: LogEntry): void {
    this.entries.push(entry)
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity)
    }
  }

  list(): LogEntry[] {
    return [...this.entries]
  }
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = (value || '').trim().toLowerCase()
  return LOG_LEVELS.find(level => level === normalized) ?? fallback
}

export class Logger {
  private readonly level: LogLevel
  private readonly colorize: boolean
  private readonly buffer: LogBuffer

  constructor(private readonly context: string, options: LoggerOptions = {}, buffer?: LogBuffer) {
    this.level = options.level ?? 'info'
    this.colorize = options.colorize ?? false
    this.buffer = buffer ?? new LogBuffer(options.capacity ?? 500)
  }

  child(context: string): Logger {
    return new Logger(context, { level: this.level, colorize: this.colorize }, this.buffer)
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta)
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta)
  }

  /** Recent entries across this logger and all of its children */
  entries(): LogEntry[] {
    return this.buffer.list()
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return
    }

    const timestamp = new Date().toISOString()
    this.buffer.push({ timestamp, level, context: this.context, message, meta })

    const levelName = level.toUpperCase().padEnd(5)
    const prefix = this.colorize
      ? `${LEVEL_COLORS[level]}${timestamp} ${levelName}${RESET_COLOR}`
      : `${timestamp} ${levelName}`
    let line = `${prefix} [${this.context}] ${message}`
    if (meta !== undefined) {
      line += ` ${formatMeta(meta)}`
    }

    switch (level) {
      case 'debug':
      case 'info':
        console.log(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
  }
}

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return meta.stack ?? meta.message
  }
  try {
    return JSON.stringify(meta)
  } catch {
    return String(meta)
  }
}

export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  return new Logger(context, options)
}
