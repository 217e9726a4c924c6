import * as fsSync from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { SerializationError, WriteError } from "../../core/errors"
import { formatCsvTimestamp } from "../../core/timestamp"
import type { LogRecord } from "../../ports/log-record"
import type { RecordWriter } from "../../ports/record-writer"
import type { Severity } from "../../ports/severity"
import { CSV_HEADER, toCsvRow } from "./csv-row"

// With the u flag a surrogate pair is one code point, so this matches unpaired halves only.
const LONE_SURROGATE = /[\uD800-\uDFFF]/u

/**
 * Appends `timestamp,LEVEL,message` rows to `{directory}/csv/{level}.csv`.
 *
 * @remarks
 * The header goes out together with the first row, but only when the file was
 * missing at the moment it was checked. The check and the append are separate
 * steps, so two concurrent first writes to one file can both add a header.
 *
 * A message with an unpaired UTF-16 surrogate has no UTF-8 form and is
 * rejected with `SerializationError` before the file is touched.
 */
export class CsvRecordWriter implements RecordWriter {
  readonly format = "csv"

  pathFor(directory: string, level: Severity): string {
    return path.join(directory, this.format, `${level}.csv`)
  }

  writeSync(directory: string, record: LogRecord): void {
    this.assertEncodable(record)
    const filePath = this.pathFor(directory, record.level)

    try {
      fsSync.mkdirSync(path.dirname(filePath), { recursive: true })
      const existed = fsSync.statSync(filePath, { throwIfNoEntry: false }) !== undefined

      fsSync.appendFileSync(filePath, this.chunk(record, existed), "utf8")
    } catch (err) {
      throw WriteError.fromCause({ path: filePath, format: this.format, level: record.level }, err)
    }
  }

  async write(directory: string, record: LogRecord): Promise<void> {
    this.assertEncodable(record)
    const filePath = this.pathFor(directory, record.level)

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      const existed = await this.exists(filePath)

      await fs.appendFile(filePath, this.chunk(record, existed), "utf8")
    } catch (err) {
      throw WriteError.fromCause({ path: filePath, format: this.format, level: record.level }, err)
    }
  }

  private assertEncodable(record: LogRecord): void {
    if (LONE_SURROGATE.test(record.message)) {
      throw SerializationError.unencodable(
        this.format,
        new Error("message contains an unpaired UTF-16 surrogate"),
      )
    }
  }

  private chunk(record: LogRecord, existed: boolean): string {
    const row = toCsvRow([
      formatCsvTimestamp(record.timestamp),
      record.level.toUpperCase(),
      record.message,
    ])

    return existed ? row : toCsvRow(CSV_HEADER) + row
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.stat(filePath)
      return true
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return false
      throw err
    }
  }
}
