/**
 * A source of raw configuration values.
 *
 * Sources only load: validation, coercion and defaults belong to the zod
 * schema handed to `loadConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env", "object:overrides". */
  readonly name: string

  /**
   * Load values. A key mapped to `undefined` counts as "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
