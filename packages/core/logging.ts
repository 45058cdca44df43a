/**
 * Logging interfaces
 */

import { HiResClock, type Timestamp } from "./time.js"

/**
 * Levels for logging information
 */
export enum LogLevel {
  FATAL = 0,
  ERROR = 10,
  WARN = 20,
  INFO = 30,
  DEBUG = 40,
}

let DEFAULT_LOG_LEVEL: LogLevel = LogLevel.WARN

export function setDefaultLogLevel(level: LogLevel): void {
  DEFAULT_LOG_LEVEL = level
}

/**
 * Defines some simple structure for log information
 */
export interface LogData {
  level: LogLevel
  message: string
  timestamp?: Timestamp
  source?: string
  context?: unknown
}

/**
 * Formatter for {@link LogData} entries
 */
export type LogFormatter = (data: LogData) => string

/**
 * Levels to strings
 */
const ReadableLogLevels = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.FATAL]: "FATAL",
} as const

/**
 * Simple format for {@link LogData} objects
 *
 * @param data The {@link LogData} to format
 * @returns A string with the time, source, level, message and any context
 */
export const SimpleLogFormatter: LogFormatter = (data: LogData) =>
  `${data.timestamp ? `[${data.timestamp.toISOString()}]:` : ""}${data.source ? `(${data.source}) ` : ""}${ReadableLogLevels[data.level]} - ${data.message}${formatContext(data.context)}`

function formatContext(context: unknown): string {
  if (context === undefined) {
    return ""
  }

  try {
    return ` ${JSON.stringify(context)}`
  } catch (err) {
    return ` [unserializable context: ${String(err)}]`
  }
}

/**
 * Simple interface for writing {@link LogData} to some source
 */
export interface LogWriter {
  /**
   * Writes the {@link LogData} to the underlying source
   *
   * @param data The {@link LogData} to write
   */
  log(data: LogData): void
}

/**
 * {@link LogWriter} that does nothing
 */
export const NoopLogWriter: LogWriter = {
  log(_data: LogData): void {},
}

/**
 * {@link LogWriter} that keeps everything it is given, useful when the output
 * needs to be inspected
 */
export class MemoryLogWriter implements LogWriter {
  readonly entries: LogData[] = []

  log(data: LogData): void {
    this.entries.push(data)
  }

  /** Remove all captured entries */
  clear(): void {
    this.entries.length = 0
  }
}

/**
 * Simple {@link LogWriter} that outputs to the console
 */
export class ConsoleLogWriter implements LogWriter {
  private _formatter: LogFormatter

  constructor(formatter?: LogFormatter) {
    this._formatter = formatter ?? SimpleLogFormatter
  }

  log(data: LogData): void {
    // eslint-disable-next-line no-console
    console.log(this._formatter(data))
  }
}

let DEFAULT_WRITER: LogWriter = NoopLogWriter

/**
 * Sets the writer used by loggers that are created without one
 *
 * @param writer The {@link LogWriter} to use for new log creation
 */
export function setDefaultWriter(writer: LogWriter): void {
  DEFAULT_WRITER = writer
}

/**
 * Simple interface for logging information
 */
export interface Logger {
  /** The current {@link LogLevel} */
  readonly level: LogLevel

  /** The source for events logged here */
  readonly name?: string

  /**
   * Update the {@link LogLevel} minimum to write with
   * @param level The new {@link LogLevel} to use
   */
  setLevel(level: LogLevel): void

  debug(message: string, context?: unknown): void
  info(message: string, context?: unknown): void
  warn(message: string, context?: unknown): void
  error(message: string, context?: unknown): void

  /** Fatal events are always written regardless of the level */
  fatal(message: string, context?: unknown): void
}

/**
 * Options for configuring loggers
 */
export interface LoggerOptions {
  /** Optional {@link LogLevel} for initial logging, default is {@link LogLevel.WARN} */
  level?: LogLevel
  /** Optional source for the logs */
  name?: string
  /** Optional {@link LogWriter}, defaults to the one set by {@link setDefaultWriter} */
  writer?: LogWriter
}

type MessageLogger = (message: string, context?: unknown) => void

const NO_OP_LOGGER: MessageLogger = (
  _message: string,
  _context?: unknown,
): void => {}

/**
 * Logger that swaps disabled levels for a no-op so callers pay nothing for
 * messages that will never be written
 */
export class DefaultLogger implements Logger {
  private _level: LogLevel
  private _writer: LogWriter
  readonly name?: string

  debug: MessageLogger = NO_OP_LOGGER
  info: MessageLogger = NO_OP_LOGGER
  warn: MessageLogger = NO_OP_LOGGER
  error: MessageLogger = NO_OP_LOGGER
  readonly fatal: MessageLogger

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? DEFAULT_LOG_LEVEL
    this._writer = options?.writer ?? DEFAULT_WRITER
    this.name = options?.name
    this.fatal = this._writerFor(LogLevel.FATAL)

    this.setLevel(this._level)
  }

  get level(): LogLevel {
    return this._level
  }

  setLevel(level: LogLevel): void {
    this._level = level

    this.debug = this._bind(LogLevel.DEBUG)
    this.info = this._bind(LogLevel.INFO)
    this.warn = this._bind(LogLevel.WARN)
    this.error = this._bind(LogLevel.ERROR)
  }

  private _bind(level: LogLevel): MessageLogger {
    return level <= this._level ? this._writerFor(level) : NO_OP_LOGGER
  }

  private _writerFor(level: LogLevel): MessageLogger {
    return (message: string, context?: unknown): void => {
      this._writer.log({
        source: this.name,
        timestamp: HiResClock.timestamp(),
        message,
        level,
        context,
      })
    }
  }
}
