import type { LogFormat, LogRecord } from "./log-record"
import type { Severity } from "./severity"

/**
 * Appends records to `{directory}/{format}/{level}.{format}`.
 *
 * Every write opens, appends and closes the file; no handle outlives a call.
 * Failures are thrown as `WriteError` (I/O) or `SerializationError` (encoding).
 */
export interface RecordWriter {
  readonly format: LogFormat

  pathFor(directory: string, level: Severity): string

  /** Blocking append on the caller's thread. */
  writeSync(directory: string, record: LogRecord): void

  /** Append through the libuv thread pool; resolves once the bytes are handed to the OS. */
  write(directory: string, record: LogRecord): Promise<void>
}
