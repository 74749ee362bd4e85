/**
 * Options accepted by SET, in the shape node-redis takes them.
 *
 * @remarks
 * - `EX` and `KEEPTTL` are mutually exclusive.
 * - `NX` + `GET` makes the store reply with the previous value (or null)
 *   instead of "OK".
 */
export type StoreSetOptions = {
  EX?: number
  KEEPTTL?: true
  NX?: true
  GET?: true
}

export type StoreScanOptions = {
  MATCH?: string
  COUNT?: number
}

export type StoreScanReply = {
  cursor: string
  keys: string[]
}

/**
 * Commands queued on a MULTI batch. Nothing is sent until `exec()`.
 */
export interface StoreBatch {
  set(key: string, value: string, opts?: StoreSetOptions): unknown
  del(keys: string | readonly string[]): unknown
  exec(): Promise<unknown[]>
}

/**
 * The command vocabulary a StoreDict needs from its store.
 *
 * @remarks
 * Method names and reply shapes follow node-redis v5 with string replies,
 * so a connected `redis` client satisfies this port directly.
 */
export interface StoreClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string, opts?: StoreSetOptions): Promise<string | null>
  getDel(key: string): Promise<string | null>
  exists(keys: string | readonly string[]): Promise<number>
  del(keys: string | readonly string[]): Promise<number>
  mGet(keys: readonly string[]): Promise<(string | null)[]>

  /** Seconds to live; -1 when the key has no expiry, -2 when it does not exist. */
  ttl(key: string): Promise<number>

  info(section?: string): Promise<string>
  multi(): StoreBatch

  /**
   * Cursor-based key enumeration. Clients that cannot enumerate keys leave
   * this out, and every scan-based dict operation then fails with
   * UnsupportedError.
   */
  scan?(cursor: string, opts?: StoreScanOptions): Promise<StoreScanReply>
}
