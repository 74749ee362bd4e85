import { type Clock, type Milliseconds, remainingSeconds, secondsToMs } from "@keel/clock"

import type {
  StoreBatch,
  StoreClient,
  StoreScanOptions,
  StoreScanReply,
  StoreSetOptions,
} from "../../ports/store-client"
import { globToRegExp } from "./glob-match"

export type MemoryStoreClientOptions = {
  /**
   * Maximum number of keys retained in the store.
   *
   * If enabled and the limit is exceeded, writes of new keys throw.
   */
  maxEntries?: number

  /** Keys per SCAN page when the caller sends no COUNT. @default 10 */
  defaultScanCount?: number
}

export type MemoryStoreClientDeps = {
  clock: Clock
}

export type MemoryStoreEntry = {
  value: string
  expiresAtMs?: Milliseconds
}

const START_CURSOR = "0"
const CURSOR_PREFIX = "k"

/**
 * In-process StoreClient with Redis reply semantics, for tests and local
 * runs.
 *
 * @remarks
 * - Expirations are checked lazily against the injected clock.
 * - SCAN walks keys in sorted order. A key present for the whole scan is
 *   returned exactly once; keys written meanwhile may or may not show up.
 *   The cursor carries the last key returned, so an abandoned scan leaves
 *   nothing behind.
 * - MULTI batches run their commands in order on `exec()` with nothing
 *   interleaved, since nothing else runs between them in process.
 */
export class MemoryStoreClient implements StoreClient {
  private readonly store = new Map<string, MemoryStoreEntry>()

  public constructor(
    private readonly deps: MemoryStoreClientDeps,
    private readonly opts: MemoryStoreClientOptions = {},
  ) {}

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null
  }

  async set(key: string, value: string, opts: StoreSetOptions = {}): Promise<string | null> {
    return this.write(key, value, opts)
  }

  async getDel(key: string): Promise<string | null> {
    const entry = this.read(key)

    if (!entry) return null

    this.store.delete(key)

    return entry.value
  }

  async exists(keys: string | readonly string[]): Promise<number> {
    return toList(keys).filter((key) => this.read(key) !== undefined).length
  }

  async del(keys: string | readonly string[]): Promise<number> {
    return this.remove(keys)
  }

  async mGet(keys: readonly string[]): Promise<(string | null)[]> {
    return keys.map((key) => this.read(key)?.value ?? null)
  }

  async ttl(key: string): Promise<number> {
    const entry = this.read(key)

    if (!entry) return -2
    if (entry.expiresAtMs === undefined) return -1

    return remainingSeconds(this.deps.clock, entry.expiresAtMs)
  }

  async info(section?: string): Promise<string> {
    this.purgeExpired()

    const expiring = [...this.store.values()].filter((e) => e.expiresAtMs !== undefined).length
    const sections: Record<string, string[]> = {
      server: ["# Server", "server_name:memory", "redis_mode:standalone"],
      keyspace: ["# Keyspace", `db0:keys=${this.store.size},expires=${expiring},avg_ttl=0`],
    }
    const wanted = section === undefined ? Object.keys(sections) : [section.toLowerCase()]

    return wanted.flatMap((name) => sections[name] ?? []).join("\r\n")
  }

  multi(): StoreBatch {
    const queued: (() => unknown)[] = []
    const batch: StoreBatch = {
      set: (key, value, opts = {}) => {
        queued.push(() => this.write(key, value, opts))
        return batch
      },
      del: (keys) => {
        const snapshot = toList(keys)
        queued.push(() => this.remove(snapshot))
        return batch
      },
      exec: async () => queued.splice(0).map((command) => command()),
    }

    return batch
  }

  async scan(cursor: string, opts: StoreScanOptions = {}): Promise<StoreScanReply> {
    const count = opts.COUNT ?? this.opts.defaultScanCount ?? 10
    const after = decodeCursor(cursor)

    this.purgeExpired()

    const ordered = [...this.store.keys()].sort()
    const start = after === undefined ? 0 : ordered.findIndex((key) => key > after)
    const page = start === -1 ? [] : ordered.slice(start, start + count)
    const last = page.at(-1)
    const match = opts.MATCH === undefined ? undefined : globToRegExp(opts.MATCH)
    const keys = match ? page.filter((key) => match.test(key)) : page

    if (last === undefined || start + count >= ordered.length) {
      return { cursor: START_CURSOR, keys }
    }

    return { cursor: encodeCursor(last), keys }
  }

  /** Number of live keys. */
  size(): number {
    this.purgeExpired()

    return this.store.size
  }

  private write(key: string, value: string, opts: StoreSetOptions): string | null {
    if (opts.EX !== undefined && (!Number.isInteger(opts.EX) || opts.EX <= 0)) {
      throw new Error("ERR invalid expire time in 'set' command")
    }

    if (opts.EX !== undefined && opts.KEEPTTL) {
      throw new Error("ERR syntax error")
    }

    const existing = this.read(key)

    if (opts.NX && existing) return opts.GET ? existing.value : null

    this.enforceMaxEntries(key)

    const expiresAtMs =
      opts.EX !== undefined
        ? this.deps.clock.nowMs() + secondsToMs(opts.EX)
        : opts.KEEPTTL
          ? existing?.expiresAtMs
          : undefined

    this.store.set(key, {
      value,
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })

    if (opts.GET) return existing?.value ?? null

    return "OK"
  }

  private remove(keys: string | readonly string[]): number {
    let removed = 0

    for (const key of toList(keys)) {
      if (this.read(key) !== undefined) {
        this.store.delete(key)
        removed += 1
      }
    }

    return removed
  }

  private read(key: string): MemoryStoreEntry | undefined {
    const entry = this.store.get(key)

    if (entry && this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private enforceMaxEntries(key: string): void {
    if (this.opts.maxEntries === undefined) return
    if (this.store.has(key)) return

    this.purgeExpired()

    if (this.store.size >= this.opts.maxEntries) {
      throw new Error(`MemoryStoreClient: max entries (${this.opts.maxEntries}) exceeded`)
    }
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) {
        this.store.delete(key)
      }
    }
  }

  private isExpired(entry: MemoryStoreEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }
}

function encodeCursor(lastKey: string): string {
  return CURSOR_PREFIX + Buffer.from(lastKey, "utf8").toString("base64url")
}

function decodeCursor(cursor: string): string | undefined {
  if (cursor === START_CURSOR) return undefined

  if (!cursor.startsWith(CURSOR_PREFIX)) {
    throw new Error(`MemoryStoreClient: invalid cursor ${cursor}`)
  }

  return Buffer.from(cursor.slice(CURSOR_PREFIX.length), "base64url").toString("utf8")
}

function toList(keys: string | readonly string[]): readonly string[] {
  return typeof keys === "string" ? [keys] : keys
}
