import * as fs from "node:fs"
import * as path from "node:path"
import { SystemClock, type TimeSource } from "@loglane/clock"
import { createStderrLogger, type Logger } from "@loglane/diagnostics"
import { AnsiConsoleSink } from "../adapters/console/ansi-console-sink"
import { CsvRecordWriter } from "../adapters/csv/csv-record-writer"
import { JsonLinesRecordWriter } from "../adapters/json/json-lines-record-writer"
import type { ConsoleSink } from "../ports/console-sink"
import {
  isLogFormat,
  type LogCallOptions,
  type LogFormat,
  type LogRecord,
} from "../ports/log-record"
import type { RecordWriter } from "../ports/record-writer"
import { isSeverity, type Severity } from "../ports/severity"
import { ConfigurationError, SerializationError } from "./errors"
import { createLogRecord } from "./log-record"
import {
  DEFAULT_PERSISTENCE_POLICY,
  type PersistencePolicy,
  shouldPersist,
} from "./persistence-policy"

/** Resolved against the working directory at construction time. */
export const DEFAULT_LOG_DIRECTORY = path.join("data", "logs")

export const DEFAULT_LOG_FORMAT: LogFormat = "json"

export const DEFAULT_LOGGER_NAME = "loglane"

export type LogManagerOptions = {
  /**
   * Root for the `json/` and `csv/` subdirectories.
   * @default "data/logs" under the working directory
   */
  directory?: string

  /** @default "json" */
  format?: LogFormat

  /** Written as `logger_name` in JSON records. @default "loglane" */
  loggerName?: string
}

export type LogManagerDeps = {
  /** @default an AnsiConsoleSink on stdout */
  console?: ConsoleSink
  clock?: TimeSource

  /** Where the manager reports on itself. @default warn-level pino on stderr */
  diagnostics?: Logger

  /** Replace the writer for a format. */
  writers?: Partial<Record<LogFormat, RecordWriter>>

  /** @default process.pid */
  processId?: number
}

/**
 * Writes every call to the console and persists it to a per-level file when
 * the level's policy, or the call's `save` flag, asks for it.
 *
 * Each severity has a suspending form (`error`) that awaits the console write
 * and then the file append through `fs/promises`, and a blocking form
 * (`errorSync`) that does the same work synchronously. Both produce identical
 * records.
 *
 * @example
 * ```ts
 * const log = new LogManager({ directory: "var/logs" })
 *
 * await log.info("cache warmed")                       // console only
 * await log.error("disk full")                         // + var/logs/json/error.json
 * log.debugSync("x=1", { save: true, format: "csv" })  // + var/logs/csv/debug.csv
 * ```
 */
export class LogManager {
  readonly directory: string
  readonly format: LogFormat
  readonly loggerName: string

  private readonly console: ConsoleSink
  private readonly clock: TimeSource
  private readonly diagnostics: Logger
  private readonly writers: Readonly<Record<LogFormat, RecordWriter>>

  /**
   * @throws {ConfigurationError} when the directory cannot be created or
   * `format` is not a supported format.
   */
  constructor(options: LogManagerOptions = {}, deps: LogManagerDeps = {}) {
    const format = options.format ?? DEFAULT_LOG_FORMAT
    if (!isLogFormat(format)) throw ConfigurationError.unsupportedFormat(format)

    this.directory = path.resolve(options.directory ?? DEFAULT_LOG_DIRECTORY)
    this.format = format
    this.loggerName = options.loggerName ?? DEFAULT_LOGGER_NAME

    this.clock = deps.clock ?? new SystemClock()
    this.diagnostics = (deps.diagnostics ?? createStderrLogger({ level: "warn" })).child({
      component: "log-manager",
      directory: this.directory,
    })
    this.console =
      deps.console ??
      new AnsiConsoleSink({ onError: (err) => this.reportConsoleFailure(err) })
    this.writers = {
      json:
        deps.writers?.json ??
        new JsonLinesRecordWriter({
          loggerName: this.loggerName,
          ...(deps.processId !== undefined && { processId: deps.processId }),
        }),
      csv: deps.writers?.csv ?? new CsvRecordWriter(),
    }

    this.ensureDirectory()
  }

  get policy(): PersistencePolicy {
    return DEFAULT_PERSISTENCE_POLICY
  }

  /** Target file for `level` in `format` (defaults to the manager's format). */
  pathFor(level: Severity, format: LogFormat = this.format): string {
    if (!isSeverity(level)) throw SerializationError.unknownLevel(level)

    return this.writerFor(format).pathFor(this.directory, level)
  }

  async log(level: Severity, message: string, options: LogCallOptions = {}): Promise<void> {
    const record = this.createRecord(level, message)

    try {
      await this.console.write(record)
    } catch (err) {
      this.reportConsoleFailure(err)
    }

    const writer = this.persistenceTarget(level, options)
    if (!writer) return

    await writer.write(this.directory, record)
  }

  logSync(level: Severity, message: string, options: LogCallOptions = {}): void {
    const record = this.createRecord(level, message)

    try {
      this.console.writeSync(record)
    } catch (err) {
      this.reportConsoleFailure(err)
    }

    const writer = this.persistenceTarget(level, options)
    if (!writer) return

    writer.writeSync(this.directory, record)
  }

  debug(message: string, options?: LogCallOptions): Promise<void> {
    return this.log("debug", message, options)
  }

  info(message: string, options?: LogCallOptions): Promise<void> {
    return this.log("info", message, options)
  }

  warning(message: string, options?: LogCallOptions): Promise<void> {
    return this.log("warning", message, options)
  }

  error(message: string, options?: LogCallOptions): Promise<void> {
    return this.log("error", message, options)
  }

  critical(message: string, options?: LogCallOptions): Promise<void> {
    return this.log("critical", message, options)
  }

  debugSync(message: string, options?: LogCallOptions): void {
    this.logSync("debug", message, options)
  }

  infoSync(message: string, options?: LogCallOptions): void {
    this.logSync("info", message, options)
  }

  warningSync(message: string, options?: LogCallOptions): void {
    this.logSync("warning", message, options)
  }

  errorSync(message: string, options?: LogCallOptions): void {
    this.logSync("error", message, options)
  }

  criticalSync(message: string, options?: LogCallOptions): void {
    this.logSync("critical", message, options)
  }

  private createRecord(level: Severity, message: string): LogRecord {
    return createLogRecord(level, message, this.clock.now())
  }

  private persistenceTarget(level: Severity, options: LogCallOptions): RecordWriter | null {
    if (!shouldPersist(this.policy, level, options.save)) return null

    return this.writerFor(options.format ?? this.format)
  }

  private writerFor(format: LogFormat): RecordWriter {
    if (!isLogFormat(format)) throw SerializationError.unsupportedFormat(format)

    return this.writers[format]
  }

  private ensureDirectory(): void {
    let stat: fs.Stats | undefined

    try {
      stat = fs.statSync(this.directory, { throwIfNoEntry: false })
    } catch (err) {
      throw ConfigurationError.directoryUnavailable(this.directory, err)
    }

    if (stat) {
      if (stat.isDirectory()) return
      throw ConfigurationError.directoryUnavailable(
        this.directory,
        new Error("path exists and is not a directory"),
      )
    }

    try {
      fs.mkdirSync(this.directory, { recursive: true })
    } catch (err) {
      throw ConfigurationError.directoryUnavailable(this.directory, err)
    }

    this.diagnostics.info("log directory created")

    try {
      this.console.writeSync({
        level: "info",
        message: `log directory created: ${this.directory}`,
        timestamp: this.clock.now(),
      })
    } catch (err) {
      this.reportConsoleFailure(err)
    }
  }

  private reportConsoleFailure(err: unknown): void {
    this.diagnostics.warn("console sink write failed; file persistence continues", { err })
  }
}
