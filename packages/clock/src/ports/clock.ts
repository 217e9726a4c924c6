/**
 * Source of wall-clock time for log record timestamps.
 *
 * @remarks
 * Log formatting reads the local-time fields of the returned Date.
 */
export type TimeSource = {
  now(): Date
}
