/**
 * Identifies which encoder/decoder pair governs a stored value.
 *
 * @remarks
 * The tag is the part of the envelope before the first `:`.
 */
export type TypeTag = string

/** Turns a value into the envelope payload. */
export type Encoder<T> = (value: T) => string

/** Rebuilds a value from an envelope payload. */
export type Decoder<T> = (payload: string) => T

/** Decides, once per encode, whether a value belongs to a registration. */
export type ValueMatcher<T> = (value: unknown) => value is T

/**
 * A registry entry.
 *
 * @remarks
 * `encode` and `decode` are registered independently: an entry may carry
 * only one of them. Without `encode` the matcher is not installed; without
 * `decode` payloads under this tag go through the default decoder.
 */
export type TypeDescriptor<T> = {
  readonly tag: TypeTag
  readonly matches: ValueMatcher<T>
  readonly encode?: Encoder<T>
  readonly decode?: Decoder<T>
}

/** Any class whose instances can be stored. */
export type StorableClass<T> = abstract new (...args: never[]) => T

export type ExtendTypeOptions<T> = {
  encode?: Encoder<T>
  decode?: Decoder<T>
  /** Instance method used when `encode` is omitted. @default "encode" */
  encodeMethodName?: string
  /** Static method used when `decode` is omitted. @default "decode" */
  decodeMethodName?: string
}
