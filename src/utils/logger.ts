/**
 * Diagnostics logger
 *
 * Leveled logging with ERROR, WARN, INFO, DEBUG and TRACE. Standard output
 * carries the formatted logcat stream, so diagnostics go to stderr unless a
 * different sink is given.
 */

import { format as formatArgs } from "node:util"
import { chalkStderr as chalk } from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4
}

export type LogSink = (line: string) => void

export interface LoggerOptions {
  level?: LogLevel
  prefix?: string
  enableColors?: boolean
  sink?: LogSink
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.WARN]: "WARN",
  [LogLevel.INFO]: "INFO",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.TRACE]: "TRACE"
}

const LOG_LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.TRACE]: chalk.dim
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

export class Logger {
  private level: LogLevel
  private prefix: string
  private enableColors: boolean
  private sink: LogSink

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv()
    this.prefix = options.prefix ?? ""
    this.enableColors = options.enableColors ?? chalk.level > 0
    this.sink = options.sink ?? stderrSink
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  shouldLog(level: LogLevel): boolean {
    return level <= this.level
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args)
  }

  /**
   * Most verbose level, used for per-line tracing
   */
  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.TRACE, message, args)
  }

  /**
   * Create a child logger sharing level and sink, with a nested prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      enableColors: this.enableColors,
      sink: this.sink
    })
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return
    const text = args.length > 0 ? formatArgs(message, ...args) : message
    this.sink(this.format(level, text))
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = []

    const levelStr = `[${LOG_LEVEL_NAMES[level]}]`.padEnd(7)
    parts.push(this.enableColors ? LOG_LEVEL_COLORS[level](levelStr) : levelStr)

    if (this.prefix) {
      const prefixStr = `[${this.prefix}]`
      parts.push(this.enableColors ? chalk.magenta(prefixStr) : prefixStr)
    }

    parts.push(message)
    return parts.join(" ")
  }
}

/**
 * Parse log level from string
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR
    case "WARN":
      return LogLevel.WARN
    case "INFO":
      return LogLevel.INFO
    case "DEBUG":
      return LogLevel.DEBUG
    case "TRACE":
      return LogLevel.TRACE
    default:
      throw new Error(`Invalid log level: ${level}. Valid levels: ERROR, WARN, INFO, DEBUG, TRACE`)
  }
}

// COLORED_LOGCAT_LOG_LEVEL, falling back to INFO when unset or unknown
function levelFromEnv(): LogLevel {
  const envLevel = process.env.COLORED_LOGCAT_LOG_LEVEL
  if (!envLevel) return LogLevel.INFO
  try {
    return parseLogLevel(envLevel)
  } catch {
    return LogLevel.INFO
  }
}

export const defaultLogger = new Logger({ prefix: "colored-logcat" })
