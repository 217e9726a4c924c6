import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { pickPrefixed } from "../../core/prefix"
import type { ConfigSource } from "../../ports/source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production"
   */
  file: string

  /** When false, a missing file yields an empty object instead of throwing. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /** Same as `EnvSource`'s prefix: matching keys only, prefix removed. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  constructor(private readonly opts: DotenvSourceOptions) {}

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return pickPrefixed(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && (err as NodeJS.ErrnoException).code === "ENOENT") {
        return {}
      }
      throw err
    }
  }
}
