/**
 * Decoder for tags nothing is registered for.
 *
 * Returns the JSON value when the payload parses as JSON, otherwise the
 * payload text. Never throws.
 */
export function defaultDecoder(payload: string): unknown {
  try {
    const parsed: unknown = JSON.parse(payload)

    return parsed
  } catch {
    return payload
  }
}
