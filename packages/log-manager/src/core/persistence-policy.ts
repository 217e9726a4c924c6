import type { Severity } from "../ports/severity"

export type PersistencePolicy = Readonly<Record<Severity, boolean>>

/** Warnings and above always reach disk; debug and info are console-only. */
export const DEFAULT_PERSISTENCE_POLICY: PersistencePolicy = Object.freeze({
  debug: false,
  info: false,
  warning: true,
  error: true,
  critical: true,
})

/**
 * `save` is OR-ed with the policy, so it can only add persistence.
 */
export function shouldPersist(
  policy: PersistencePolicy,
  level: Severity,
  save = false,
): boolean {
  return policy[level] || save === true
}
