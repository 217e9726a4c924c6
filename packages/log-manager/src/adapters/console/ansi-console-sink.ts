import { formatConsoleTimestamp } from "../../core/timestamp"
import type { ConsoleEntry, ConsoleSink } from "../../ports/console-sink"
import { paint, styleFor } from "./styles"

export const LEVEL_COLUMN_WIDTH = 8

export type ConsoleStream = Pick<NodeJS.WritableStream, "write" | "on"> & { isTTY?: boolean }

export type AnsiConsoleSinkOptions = {
  /** @default process.stdout */
  stream?: ConsoleStream

  /** @default true when the stream is a TTY */
  color?: boolean

  /**
   * Receives stream failures that no caller is waiting on: errors behind a
   * `writeSync`, and `"error"` events on the stream. Each error is passed
   * once, and never for a `write()` that already rejected with it.
   */
  onError: (err: Error) => void
}

/**
 * Renders `[MM/DD/YY HH:MM:SS] | LEVEL    | message` lines with ANSI colors.
 */
export class AnsiConsoleSink implements ConsoleSink {
  private readonly stream: ConsoleStream
  private readonly color: boolean
  private readonly onError: (err: Error) => void
  private readonly delivered = new WeakSet<Error>()

  constructor(options: AnsiConsoleSinkOptions) {
    this.stream = options.stream ?? process.stdout
    this.color = options.color ?? this.stream.isTTY === true
    this.onError = options.onError

    // Failed writes are also emitted as "error", which must have a listener.
    this.stream.on("error", (err: Error) => this.report(err))
  }

  format(entry: ConsoleEntry): string {
    const label = entry.level.toUpperCase().padEnd(LEVEL_COLUMN_WIDTH)
    const level = this.color ? paint(label, styleFor(entry.level)) : label

    return `${formatConsoleTimestamp(entry.timestamp)} | ${level} | ${entry.message}`
  }

  writeSync(entry: ConsoleEntry): void {
    this.stream.write(`${this.format(entry)}\n`, (err) => {
      if (err) this.report(err)
    })
  }

  write(entry: ConsoleEntry): Promise<void> {
    const line = `${this.format(entry)}\n`

    return new Promise((resolve, reject) => {
      this.stream.write(line, (err) => {
        if (!err) return resolve()

        this.delivered.add(err)
        reject(err)
      })
    })
  }

  private report(err: Error): void {
    if (this.delivered.has(err)) return
    this.delivered.add(err)
    this.onError(err)
  }
}
