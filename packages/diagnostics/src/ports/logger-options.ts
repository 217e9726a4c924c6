import type { LogLevelName } from "./log-level"

/**
 * Policy for a diagnostics logger; adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output instead of JSON lines.
   *
   * @remarks
   * Meant for local development; keep it off where logs are collected.
   */
  prettify?: boolean
}
