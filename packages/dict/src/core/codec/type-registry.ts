import { isAppError } from "@keel/errors"

import type {
  Decoder,
  Encoder,
  ExtendTypeOptions,
  StorableClass,
  TypeDescriptor,
  TypeTag,
  ValueMatcher,
} from "../../ports/codec"
import { TypeMismatchError } from "../errors"
import { registerBuiltinTypes } from "./builtin-types"
import { defaultDecoder } from "./default-decoder"
import { instanceMatcher, methodDecoder, methodEncoder } from "./method-codec"

export type EncodedValue = {
  readonly tag: TypeTag
  readonly payload: string
}

type EncoderEntry = {
  readonly matches: (value: unknown) => boolean
  readonly encode: (value: unknown) => string
}

/**
 * Maps values to type tags and payloads, and tags back to decoders.
 *
 * @remarks
 * Encoders and decoders live in separate maps and are replaced per tag
 * (last write wins). A value's tag is the newest encoder registration
 * whose matcher accepts it.
 */
export class TypeRegistry {
  private readonly encoders = new Map<TypeTag, EncoderEntry>()
  private readonly decoders = new Map<TypeTag, Decoder<unknown>>()
  private resolutionOrder: TypeTag[] = []

  register<T>(descriptor: TypeDescriptor<T>): this {
    if (descriptor.encode) this.setEncoder(descriptor.tag, descriptor.matches, descriptor.encode)
    if (descriptor.decode) this.setDecoder(descriptor.tag, descriptor.decode)

    return this
  }

  setEncoder<T>(tag: TypeTag, matches: ValueMatcher<T>, encode: Encoder<T>): this {
    this.encoders.set(tag, {
      matches,
      encode: (value) => {
        if (!matches(value)) {
          throw new TypeMismatchError(`Encoder for "${tag}" does not accept this value`, {
            tag,
            valueType: describeType(value),
          })
        }

        return encode(value)
      },
    })
    this.resolutionOrder = [tag, ...this.resolutionOrder.filter((t) => t !== tag)]

    return this
  }

  setDecoder<T>(tag: TypeTag, decode: Decoder<T>): this {
    this.decoders.set(tag, decode)

    return this
  }

  /**
   * Registers `type` under its class name.
   *
   * The encoder is installed before the decoder is resolved, so a class
   * without the static decode method keeps its encoder even though this
   * call throws MissingCapabilityError.
   */
  extend<T extends object>(type: StorableClass<T>, opts: ExtendTypeOptions<T> = {}): this {
    const tag = type.name
    const matches = instanceMatcher(type)

    this.setEncoder(tag, matches, opts.encode ?? methodEncoder(type, opts.encodeMethodName ?? "encode"))
    this.setDecoder(tag, opts.decode ?? methodDecoder(type, opts.decodeMethodName ?? "decode"))

    return this
  }

  hasEncoder(tag: TypeTag): boolean {
    return this.encoders.has(tag)
  }

  hasDecoder(tag: TypeTag): boolean {
    return this.decoders.has(tag)
  }

  /** Tags in the order they are tried when encoding. */
  encoderTags(): readonly TypeTag[] {
    return [...this.resolutionOrder]
  }

  encode(value: unknown): EncodedValue {
    for (const tag of this.resolutionOrder) {
      const entry = this.encoders.get(tag)

      if (entry?.matches(value)) return { tag, payload: entry.encode(value) }
    }

    return fallbackEncode(value)
  }

  /** Unknown tags go through the default decoder and never throw. */
  decode(tag: TypeTag, payload: string): unknown {
    const decode = this.decoders.get(tag)

    if (!decode) return defaultDecoder(payload)

    try {
      return decode(payload)
    } catch (err) {
      if (isAppError(err)) throw err

      throw new TypeMismatchError(`Payload could not be decoded as "${tag}"`, { tag }, err)
    }
  }
}

function describeType(value: unknown): string {
  if (value === null) return "null"
  if (typeof value !== "object") return typeof value

  const ctor: unknown = Reflect.get(value, "constructor")

  return typeof ctor === "function" && ctor.name ? ctor.name : "object"
}

function fallbackEncode(value: unknown): EncodedValue {
  const tag = describeType(value)
  const json: unknown = JSON.stringify(value)

  return { tag, payload: typeof json === "string" ? json : String(value) }
}

/** A registry holding the built-in tags. */
export function createTypeRegistry(): TypeRegistry {
  return registerBuiltinTypes(new TypeRegistry())
}

/**
 * Process-wide registry for callers that want `extendType` to apply across
 * dicts. Dicts only use it when it is passed in.
 */
export const defaultTypeRegistry: TypeRegistry = createTypeRegistry()
