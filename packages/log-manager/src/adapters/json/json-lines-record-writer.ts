import * as fsSync from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { SerializationError, WriteError } from "../../core/errors"
import { formatIsoLocal } from "../../core/timestamp"
import type { LogRecord } from "../../ports/log-record"
import type { RecordWriter } from "../../ports/record-writer"
import type { Severity } from "../../ports/severity"

export type JsonLinesRecordWriterOptions = {
  /** Written as `logger_name` on every line. */
  loggerName: string

  /** Written as `process_id` on every line. @default process.pid */
  processId?: number
}

/** One line of a `{level}.json` file. */
export type JsonLogLine = {
  timestamp: string
  level: string
  message: string
  logger_name: string
  process_id: number
}

/**
 * Appends one JSON object per line to `{directory}/json/{level}.json`.
 */
export class JsonLinesRecordWriter implements RecordWriter {
  readonly format = "json"
  private readonly loggerName: string
  private readonly processId: number

  constructor(options: JsonLinesRecordWriterOptions) {
    this.loggerName = options.loggerName
    this.processId = options.processId ?? process.pid
  }

  pathFor(directory: string, level: Severity): string {
    return path.join(directory, this.format, `${level}.json`)
  }

  writeSync(directory: string, record: LogRecord): void {
    const line = this.encode(record)
    const filePath = this.pathFor(directory, record.level)

    try {
      fsSync.mkdirSync(path.dirname(filePath), { recursive: true })
      fsSync.appendFileSync(filePath, line, "utf8")
    } catch (err) {
      throw WriteError.fromCause({ path: filePath, format: this.format, level: record.level }, err)
    }
  }

  async write(directory: string, record: LogRecord): Promise<void> {
    const line = this.encode(record)
    const filePath = this.pathFor(directory, record.level)

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      await fs.appendFile(filePath, line, "utf8")
    } catch (err) {
      throw WriteError.fromCause({ path: filePath, format: this.format, level: record.level }, err)
    }
  }

  toLine(record: LogRecord): JsonLogLine {
    return {
      timestamp: formatIsoLocal(record.timestamp),
      level: record.level.toUpperCase(),
      message: record.message,
      logger_name: this.loggerName,
      process_id: this.processId,
    }
  }

  private encode(record: LogRecord): string {
    try {
      return `${JSON.stringify(this.toLine(record))}\n`
    } catch (err) {
      throw SerializationError.unencodable(this.format, err)
    }
  }
}
