/**
 * A source of raw configuration values. Sources only load; validation and
 * coercion happen in `loadConfig`, and later sources override earlier ones.
 */
export interface ConfigSource {
  /** An undefined value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
