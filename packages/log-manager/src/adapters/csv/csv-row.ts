export const CSV_HEADER = ["timestamp", "level", "message"] as const

export const CSV_ROW_TERMINATOR = "\r\n"

const NEEDS_QUOTING = /[",\r\n]/

/** RFC 4180 field: quoted only when it holds a comma, quote or line break. */
export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value
  return `"${value.replaceAll('"', '""')}"`
}

export function toCsvRow(fields: ReadonlyArray<string>): string {
  return fields.map(escapeCsvField).join(",") + CSV_ROW_TERMINATOR
}
