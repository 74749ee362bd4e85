import { ValidationError } from "../errors"

/**
 * Throws ValidationError when `value` is a string longer than `maxBytes`
 * in UTF-8. Non-string values are not measured.
 */
export function assertWithinSizeLimit(
  role: "key" | "value",
  value: unknown,
  maxBytes: number,
): void {
  if (typeof value !== "string") return

  const size = Buffer.byteLength(value, "utf8")

  if (size > maxBytes) {
    throw new ValidationError(`The ${role} size exceeds the maximum limit of ${maxBytes} bytes`, {
      role,
      size,
      maxBytes,
    })
  }
}
