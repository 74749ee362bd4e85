import type { Decoder, Encoder, StorableClass, ValueMatcher } from "../../ports/codec"
import { MissingCapabilityError, TypeMismatchError } from "../errors"

/**
 * Matches instances whose class is exactly `type` (subclasses are not
 * matched, so they can register their own tag).
 */
export function instanceMatcher<T extends object>(type: StorableClass<T>): ValueMatcher<T> {
  return (value: unknown): value is T =>
    value instanceof type && Object.getPrototypeOf(value) === type.prototype
}

/**
 * Encoder calling the instance method `methodName` on each value.
 *
 * @throws MissingCapabilityError when the prototype has no such callable member.
 */
export function methodEncoder<T extends object>(
  type: StorableClass<T>,
  methodName: string,
): Encoder<T> {
  const prototype: unknown = type.prototype

  if (
    typeof prototype !== "object" ||
    prototype === null ||
    typeof Reflect.get(prototype, methodName) !== "function"
  ) {
    throw new MissingCapabilityError(type.name, methodName, "instance")
  }

  return (value) => {
    const method: unknown = Reflect.get(value, methodName)

    if (typeof method !== "function") {
      throw new MissingCapabilityError(type.name, methodName, "instance")
    }

    const payload: unknown = method.call(value)

    if (typeof payload !== "string") {
      throw new TypeMismatchError(`${type.name}.prototype.${methodName}() must return a string`, {
        typeName: type.name,
        member: methodName,
      })
    }

    return payload
  }
}

/**
 * Decoder calling the static method `methodName` with each payload.
 *
 * @throws MissingCapabilityError when the class has no such callable member.
 */
export function methodDecoder<T extends object>(
  type: StorableClass<T>,
  methodName: string,
): Decoder<T> {
  const method: unknown = Reflect.get(type, methodName)

  if (typeof method !== "function") {
    throw new MissingCapabilityError(type.name, methodName, "static")
  }

  return (payload) => {
    const value: unknown = method.call(type, payload)

    if (!(value instanceof type)) {
      throw new TypeMismatchError(`${type.name}.${methodName}() must return a ${type.name}`, {
        typeName: type.name,
        member: methodName,
      })
    }

    return value
  }
}
