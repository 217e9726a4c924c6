/**
 * Validated, read-only configuration.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     DIRECTORY: z._default(z.string(), "data/logs"),
 *     FORMAT: z._default(z.enum(["json", "csv"]), "json"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "LOGLANE_" })],
 * })
 *
 * config.get("FORMAT") // "csv"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  get<K extends keyof T & string>(key: K): T[K]
}
