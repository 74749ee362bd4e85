/** Lowercase snake-case identifier, e.g. `not_found`. */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, namespaces, limits).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`: absent key, oversized value, store
   * unavailable) versus a programmer error or broken invariant (`false`).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error for logs and error context.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
