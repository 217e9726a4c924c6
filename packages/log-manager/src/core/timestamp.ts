function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0")
}

function clockTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

/** `[MM/DD/YY HH:MM:SS]` in local time. */
export function formatConsoleTimestamp(date: Date): string {
  const year = pad(date.getFullYear() % 100)
  return `[${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${year} ${clockTime(date)}]`
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatCsvTimestamp(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${clockTime(date)}`
}

/**
 * ISO-8601 in local time with the UTC offset, e.g. `2024-01-15T19:30:00.000+09:00`.
 */
export function formatIsoLocal(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset()
  const sign = offsetMinutes >= 0 ? "+" : "-"
  const abs = Math.abs(offsetMinutes)
  const offset = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`

  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`

  return `${day}T${clockTime(date)}.${pad(date.getMilliseconds(), 3)}${offset}`
}
