/**
 * Fields the log manager attaches when it reports on itself.
 */
export type LogContext = {
  component: string
  directory: string
  file: string
  format: string
  severity: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/** A partial overlay applied by child() to add or override context fields. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
