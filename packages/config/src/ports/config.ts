/**
 * Validated configuration plus the provenance of each value.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ DICT_NAMESPACE: z.string().default("main") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("DICT_NAMESPACE")     // "sessions"
 * config.explain("DICT_NAMESPACE") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys supplied by sources that the schema does not know about. */
  unknownKeys(): string[]
}
