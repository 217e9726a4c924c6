import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

/**
 * The part of a zod schema that `loadConfig` relies on.
 * Both `zod` and `zod/mini` schemas satisfy it.
 */
export type ConfigSchema<T> = {
  safeParse(data: unknown):
    | { success: true; data: T }
    | {
        success: false
        error: {
          issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>
        }
      }
}

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ConfigSchema<T>

  /** Applied in order, later wins. @default [new EnvSource()] */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigValidationError.fromIssues(result.error.issues)
  }

  return new Config<T>(result.data)
}
