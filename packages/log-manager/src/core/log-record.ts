import type { LogRecord } from "../ports/log-record"
import { isSeverity, type Severity } from "../ports/severity"
import { SerializationError } from "./errors"

export function createLogRecord(level: Severity, message: unknown, timestamp: Date): LogRecord {
  if (!isSeverity(level)) {
    throw SerializationError.unknownLevel(level)
  }

  if (typeof message !== "string") {
    throw SerializationError.invalidMessage(message)
  }

  return Object.freeze({ timestamp, level, message })
}
