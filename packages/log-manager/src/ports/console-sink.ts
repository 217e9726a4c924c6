import type { Severity } from "./severity"

export type ConsoleEntry = Readonly<{
  level: Severity
  message: string
  timestamp: Date
}>

/**
 * Interactive output for every log call, regardless of persistence.
 */
export interface ConsoleSink {
  writeSync(entry: ConsoleEntry): void

  /** Resolves once the stream accepted the line; rejects on a stream error. */
  write(entry: ConsoleEntry): Promise<void>
}
