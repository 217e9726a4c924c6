import type { Severity } from "./severity"

export const logFormats = ["json", "csv"] as const

export type LogFormat = (typeof logFormats)[number]

export function isLogFormat(value: unknown): value is LogFormat {
  return value === "json" || value === "csv"
}

/**
 * One log call. Frozen on creation and dropped once dispatched.
 */
export type LogRecord = Readonly<{
  timestamp: Date
  level: Severity
  message: string
}>

export type LogCallOptions = {
  /**
   * Persist this record even when its level is console-only by default.
   * Cannot turn persistence off for a level that persists by default.
   * @default false
   */
  save?: boolean

  /** File format for this call only. Defaults to the manager's format. */
  format?: LogFormat
}
