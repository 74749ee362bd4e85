import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by all adapters.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Keep off in production,
   * where one JSON object per line is expected.
   */
  prettify?: boolean
}
