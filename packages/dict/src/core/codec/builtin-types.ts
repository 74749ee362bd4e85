import { TypeMismatchError } from "../errors"
import type { TypeRegistry } from "./type-registry"

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function parseJson(tag: string, payload: string): unknown {
  try {
    const parsed: unknown = JSON.parse(payload)

    return parsed
  } catch (err) {
    throw new TypeMismatchError(`Payload for "${tag}" is not valid JSON`, { tag }, err)
  }
}

function parseJsonArray(tag: string, payload: string): unknown[] {
  const parsed = parseJson(tag, payload)

  if (!Array.isArray(parsed)) {
    throw new TypeMismatchError(`Payload for "${tag}" is not a JSON array`, { tag })
  }

  return parsed
}

function toPair(tag: string, item: unknown): [unknown, unknown] {
  if (!Array.isArray(item) || item.length !== 2) {
    throw new TypeMismatchError(`Payload for "${tag}" must hold [key, value] pairs`, { tag })
  }

  return [item[0], item[1]]
}

/**
 * Installs the tags every registry starts with.
 *
 * | tag       | values                              | payload              |
 * |-----------|-------------------------------------|----------------------|
 * | `string`  | strings                             | the string           |
 * | `integer` | integral numbers                    | decimal text         |
 * | `float`   | other numbers (incl. NaN, Infinity) | decimal text         |
 * | `boolean` | booleans                            | `true` / `false`     |
 * | `null`    | null and undefined                  | empty                |
 * | `bigint`  | bigints                             | decimal text         |
 * | `list`    | arrays                              | JSON                 |
 * | `mapping` | plain objects                       | JSON                 |
 * | `Date`    | Date instances                      | ISO-8601             |
 * | `Set`     | Set instances                       | JSON array           |
 * | `Map`     | Map instances                       | JSON array of pairs  |
 * | `bytes`   | Uint8Array (and Buffer)             | base64               |
 *
 * Containers hold JSON values; nested Dates, Sets and class instances do not
 * survive a round trip.
 */
export function registerBuiltinTypes(registry: TypeRegistry): TypeRegistry {
  return registry
    .register({
      tag: "string",
      matches: (v): v is string => typeof v === "string",
      encode: (v) => v,
      decode: (p) => p,
    })
    .register({
      tag: "integer",
      matches: (v): v is number => typeof v === "number" && Number.isInteger(v),
      encode: (v) => String(v),
      decode: (p) => Number(p),
    })
    .register({
      tag: "float",
      matches: (v): v is number => typeof v === "number" && !Number.isInteger(v),
      encode: (v) => String(v),
      decode: (p) => Number(p),
    })
    .register({
      tag: "boolean",
      matches: (v): v is boolean => typeof v === "boolean",
      encode: (v) => String(v),
      decode: (p) => p === "true",
    })
    .register({
      tag: "null",
      matches: (v): v is null | undefined => v === null || v === undefined,
      encode: () => "",
      decode: () => null,
    })
    .register({
      tag: "bigint",
      matches: (v): v is bigint => typeof v === "bigint",
      encode: (v) => v.toString(),
      decode: (p) => BigInt(p),
    })
    .register({
      tag: "list",
      matches: (v): v is unknown[] => Array.isArray(v),
      encode: (v) => JSON.stringify(v),
      decode: (p) => parseJsonArray("list", p),
    })
    .register({
      tag: "mapping",
      matches: isPlainObject,
      encode: (v) => JSON.stringify(v),
      decode: (p) => {
        const parsed = parseJson("mapping", p)

        if (!isPlainObject(parsed)) {
          throw new TypeMismatchError('Payload for "mapping" is not a JSON object', {
            tag: "mapping",
          })
        }

        return parsed
      },
    })
    .register({
      tag: "Date",
      matches: (v): v is Date => v instanceof Date,
      encode: (v) => (Number.isNaN(v.getTime()) ? "Invalid Date" : v.toISOString()),
      decode: (p) => new Date(p),
    })
    .register({
      tag: "Set",
      matches: (v): v is Set<unknown> => v instanceof Set,
      encode: (v) => JSON.stringify([...v]),
      decode: (p) => new Set(parseJsonArray("Set", p)),
    })
    .register({
      tag: "Map",
      matches: (v): v is Map<unknown, unknown> => v instanceof Map,
      encode: (v) => JSON.stringify([...v.entries()]),
      decode: (p) => new Map(parseJsonArray("Map", p).map((item) => toPair("Map", item))),
    })
    .register({
      tag: "bytes",
      matches: (v): v is Uint8Array => v instanceof Uint8Array,
      encode: (v) => Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64"),
      decode: (p) => new Uint8Array(Buffer.from(p, "base64")),
    })
}
