export const severityNames = ["debug", "info", "warning", "error", "critical"] as const

export type Severity = (typeof severityNames)[number]

/**
 * Rank of each severity; higher is more severe.
 */
export const SeverityRank = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
} as const satisfies Record<Severity, number>

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && Object.hasOwn(SeverityRank, value)
}

/** Negative when `a` is less severe than `b`, zero when equal. */
export function compareSeverity(a: Severity, b: Severity): number {
  return SeverityRank[a] - SeverityRank[b]
}
