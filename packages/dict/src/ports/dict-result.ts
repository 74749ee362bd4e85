export type DictFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type DictNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a dict lookup. A miss means the key is absent (or expired).
 */
export type DictResult<T> = DictFound<T> | DictNotFound

/** Anything a dict can be merged with or compared to. */
export type Mapping<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>

export type DictEntry<T> = readonly [string, T]
