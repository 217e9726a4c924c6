import { BaseError } from "@loglane/errors"
import type { LogFormat } from "../ports/log-record"

const RETRYABLE_IO_CODES = new Set(["EAGAIN", "EBUSY", "EMFILE", "ENFILE"])

function errnoCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined
  const code: unknown = Reflect.get(err, "code")
  return typeof code === "string" ? code : undefined
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class ConfigurationError extends BaseError<"configuration_error"> {
  static directoryUnavailable(directory: string, cause: unknown): ConfigurationError {
    const errno = errnoCode(cause)

    return new ConfigurationError(
      `Cannot use log directory ${directory}: ${reason(cause)}`,
      {
        code: "configuration_error",
        context: { directory, ...(errno !== undefined && { errno }) },
        cause,
      },
    )
  }

  static invalidSettings(cause: unknown): ConfigurationError {
    return new ConfigurationError(`Invalid log settings: ${reason(cause)}`, {
      code: "configuration_error",
      cause,
    })
  }

  static unsupportedFormat(format: unknown): ConfigurationError {
    return new ConfigurationError(`Unsupported log format: ${String(format)}`, {
      code: "configuration_error",
      context: { format },
    })
  }
}

export type WriteTarget = {
  path: string
  format: LogFormat
  level: string
}

export class WriteError extends BaseError<"write_error"> {
  static fromCause(target: WriteTarget, cause: unknown): WriteError {
    const errno = errnoCode(cause)

    return new WriteError(
      `Failed to append ${target.format} record to ${target.path}: ${reason(cause)}`,
      {
        code: "write_error",
        context: { ...target, ...(errno !== undefined && { errno }) },
        cause,
        isRetryable: errno !== undefined && RETRYABLE_IO_CODES.has(errno),
      },
    )
  }
}

export class SerializationError extends BaseError<"serialization_error"> {
  static invalidMessage(message: unknown): SerializationError {
    return new SerializationError(
      `Log message must be a string, received ${message === null ? "null" : typeof message}`,
      {
        code: "serialization_error",
        context: { receivedType: message === null ? "null" : typeof message },
      },
    )
  }

  static unknownLevel(level: unknown): SerializationError {
    return new SerializationError(`Unknown log level: ${String(level)}`, {
      code: "serialization_error",
      context: { level },
    })
  }

  static unencodable(format: LogFormat, cause: unknown): SerializationError {
    return new SerializationError(`Cannot encode record as ${format}: ${reason(cause)}`, {
      code: "serialization_error",
      context: { format },
      cause,
    })
  }

  static unsupportedFormat(format: unknown): SerializationError {
    return new SerializationError(`No writer for log format: ${String(format)}`, {
      code: "serialization_error",
      context: { format },
    })
  }
}
