export const KEY_SEPARATOR = ":"

/**
 * Maps user keys to namespaced store keys and back.
 *
 * @remarks
 * No escaping: `:` inside a user key is stored as-is, and `parse` simply
 * drops the `namespace:` prefix. Only pass keys from this namespace to `parse`.
 */
export class KeyCodec {
  private readonly prefixLength: number

  constructor(readonly namespace: string) {
    this.prefixLength = namespace.length + KEY_SEPARATOR.length
  }

  format(key: string): string {
    return `${this.namespace}${KEY_SEPARATOR}${key}`
  }

  parse(formattedKey: string): string {
    return formattedKey.slice(this.prefixLength)
  }

  /**
   * SCAN MATCH pattern for keys starting with `searchTerm`.
   *
   * Glob metacharacters in `searchTerm` reach the store unescaped.
   */
  scanPattern(searchTerm = ""): string {
    return `${this.format(searchTerm)}*`
  }

  /** Parses a scanned key and drops `searchTerm` from its front. */
  relativeTo(searchTerm: string, formattedKey: string): string {
    const key = this.parse(formattedKey)

    return key.startsWith(searchTerm) ? key.slice(searchTerm.length) : key
  }
}

export function chainKey(parts: readonly string[]): string {
  return parts.join(KEY_SEPARATOR)
}

/**
 * Name of the secondary index an insertion-ordered dict keeps beside
 * `namespace`.
 */
export function insertionOrderKey(namespace: string, prefix = "keel-dict"): string {
  return `${prefix}-insertion-order-${namespace}`
}
