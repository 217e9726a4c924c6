import { isSeverity, type Severity } from "../../ports/severity"

export type ConsoleStyle = "cyan" | "green" | "yellow" | "red" | "bold red" | "white"

export const SEVERITY_STYLES: Readonly<Record<Severity, ConsoleStyle>> = Object.freeze({
  debug: "cyan",
  info: "green",
  warning: "yellow",
  error: "red",
  critical: "bold red",
})

const SGR: Record<ConsoleStyle, string> = {
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  "bold red": "\x1b[1;31m",
  white: "\x1b[37m",
}

const RESET = "\x1b[0m"

/** Style for a level name; names outside the severity table render white. */
export function styleFor(level: string): ConsoleStyle {
  return isSeverity(level) ? SEVERITY_STYLES[level] : "white"
}

export function paint(text: string, style: ConsoleStyle): string {
  return `${SGR[style]}${text}${RESET}`
}
