import type { Milliseconds, Seconds } from "@keel/clock"

/**
 * Expiry applied to written keys.
 *
 * @remarks
 * A bare number means seconds. Durations are sent as whole seconds (floor),
 * never less than 1.
 */
export type DictTtl =
  | Seconds
  | { readonly kind: "seconds"; readonly seconds: Seconds }
  | { readonly kind: "milliseconds"; readonly milliseconds: Milliseconds }

export type StoreDictOptions = {
  /** Prefix of every stored key (`namespace:key`). */
  namespace: string

  /** Expiry for written keys. Unset means keys never expire. */
  expire?: DictTtl

  /**
   * Keep the remaining TTL of a key when overwriting it.
   *
   * First writes still get `expire`.
   */
  preserveExpiration: boolean

  /** Make `delete` throw NotFoundError for absent keys. */
  raiseOnMissingDelete: boolean

  /**
   * COUNT hint for SCAN, and chunk size for MGET/DEL over scanned keys.
   * Tunes round trips only; it is not a page size.
   */
  batchSizeHint: number

  /** Byte ceiling for keys and string values. */
  maxStringSize: number

  /** Instance method `extendType` falls back to for encoding. */
  customEncodeMethod: string

  /** Static method `extendType` falls back to for decoding. */
  customDecodeMethod: string
}

export const MAX_STRING_SIZE = 500 * 1024 * 1024

export const defaultStoreDictOptions: Readonly<StoreDictOptions> = Object.freeze({
  namespace: "main",
  preserveExpiration: false,
  raiseOnMissingDelete: false,
  batchSizeHint: 200,
  maxStringSize: MAX_STRING_SIZE,
  customEncodeMethod: "encode",
  customDecodeMethod: "decode",
})
