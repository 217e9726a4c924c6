/**
 * Keeps the keys that start with `prefix` and strips it from them.
 * A key equal to the prefix is dropped.
 */
export function pickPrefixed<V>(
  values: Record<string, V>,
  prefix: string | undefined,
): Record<string, V> {
  if (!prefix) return { ...values }

  const picked: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      picked[key.slice(prefix.length)] = value
    }
  }

  return picked
}
