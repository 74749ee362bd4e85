import type { TypeRegistry } from "./type-registry"

export const ENVELOPE_SEPARATOR = ":"

/**
 * Reads and writes the `tag:payload` string stored under each key.
 */
export class EnvelopeCodec {
  constructor(private readonly registry: TypeRegistry) {}

  encode(value: unknown): string {
    const { tag, payload } = this.registry.encode(value)

    return `${tag}${ENVELOPE_SEPARATOR}${payload}`
  }

  /**
   * Splits on the first separator only; payloads may contain `:`.
   * A string without any separator was not written by a dict and is
   * returned as-is.
   */
  decode(envelope: string): unknown {
    const at = envelope.indexOf(ENVELOPE_SEPARATOR)

    if (at === -1) return envelope

    return this.registry.decode(envelope.slice(0, at), envelope.slice(at + 1))
  }
}
