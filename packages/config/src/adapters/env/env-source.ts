import { pickPrefixed } from "../../core/prefix"
import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only keys starting with this prefix are loaded, with the prefix removed.
   * @example "LOGLANE_" turns `LOGLANE_FORMAT` into `FORMAT`
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return pickPrefixed(this.env, this.prefix)
  }
}
