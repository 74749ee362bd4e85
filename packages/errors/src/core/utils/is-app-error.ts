import type { AppError, ErrorCode } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for AppError, so errors crossing package copies still match.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp)
  )
}

/**
 * `true` when `e` is an AppError carrying `code`.
 *
 * @example
 * ```ts
 * try {
 *   await dict.pop("session:1")
 * } catch (err) {
 *   if (!hasErrorCode(err, "not_found")) throw err
 * }
 * ```
 */
export function hasErrorCode<C extends ErrorCode>(
  e: unknown,
  code: C,
): e is AppError & { readonly code: C } {
  return isAppError(e) && e.code === code
}
