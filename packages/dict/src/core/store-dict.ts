import { createNullLogger, type Logger } from "@keel/logger"
import chunk from "lodash/chunk"
import isEqual from "lodash/isEqual"
import { z } from "zod"

import type { ExtendTypeOptions, StorableClass } from "../ports/codec"
import { defaultStoreDictOptions, type DictTtl, type StoreDictOptions } from "../ports/dict-options"
import type { DictEntry, DictResult, Mapping } from "../ports/dict-result"
import type { StoreClient } from "../ports/store-client"
import { isPlainObject } from "./codec/builtin-types"
import { EnvelopeCodec } from "./codec/envelope"
import { createTypeRegistry, type TypeRegistry } from "./codec/type-registry"
import { CommandBuilder } from "./commands/command-builder"
import { toArgs } from "./commands/store-command"
import { TtlPolicy } from "./commands/ttl-policy"
import { NotFoundError, TypeMismatchError, ValidationError } from "./errors"
import { chainKey, KeyCodec } from "./keys/key-codec"
import { PipelineScope } from "./pipeline/pipeline-scope"
import { KeyScanner } from "./scan/key-scanner"
import { assertWithinSizeLimit } from "./validation/size-limit"

export type StoreDictDeps<V> = {
  client: StoreClient

  /** Checks every decoded value before it is handed out. */
  schema: z.ZodType<V>

  /** Defaults to a fresh registry holding the built-in tags. */
  registry?: TypeRegistry

  logger?: Logger
}

/** Anything a dict can merge with or compare against. */
export type DictOperand<V> = Mapping<V> | StoreDict<V>

/**
 * A namespaced, typed dictionary living in a Redis-compatible store.
 *
 * @remarks
 * Every method is a round trip: nothing is cached locally, so `size()` and
 * the iterators always reflect the store at the time they run. Values are
 * stored as `tag:payload` strings under `namespace:key`.
 *
 * Writes made while a {@link StoreDict.pipeline} scope is open are queued
 * and sent together when the outermost scope exits; reads always go to the
 * store directly and do not see queued writes.
 *
 * @example
 * ```ts
 * const dict = createStoreDict({ client }, { namespace: "sessions", expire: 3600 })
 *
 * await dict.set("alice", { visits: 1 })
 * await dict.getOr("bob", null) // null
 * ```
 */
export class StoreDict<V = unknown> implements AsyncIterable<string> {
  readonly namespace: string
  readonly registry: TypeRegistry

  private readonly opts: StoreDictOptions
  private readonly keyCodec: KeyCodec
  private readonly envelope: EnvelopeCodec
  private readonly ttl: TtlPolicy
  private readonly commands: CommandBuilder
  private readonly scope: PipelineScope
  private readonly scanner: KeyScanner
  private readonly logger: Logger

  constructor(
    private readonly deps: StoreDictDeps<V>,
    opts: Partial<StoreDictOptions> = {},
  ) {
    this.opts = { ...defaultStoreDictOptions, ...opts }
    assertValidOptions(this.opts)

    this.namespace = this.opts.namespace
    this.registry = deps.registry ?? createTypeRegistry()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "store-dict",
      namespace: this.namespace,
    })

    this.keyCodec = new KeyCodec(this.namespace)
    this.envelope = new EnvelopeCodec(this.registry)
    this.ttl = new TtlPolicy(this.opts.expire, this.opts.preserveExpiration)
    this.commands = new CommandBuilder({ client: deps.client, ttl: this.ttl })
    this.scope = new PipelineScope({ client: deps.client, logger: this.logger })
    this.scanner = new KeyScanner(
      { client: deps.client, keys: this.keyCodec },
      { batchSizeHint: this.opts.batchSizeHint },
    )
  }

  async get(key: string): Promise<DictResult<V>> {
    this.assertKey(key)

    const raw = await this.deps.client.get(this.keyCodec.format(key))

    if (raw === null) return { kind: "not_found" }

    return { kind: "found", value: this.decode(key, raw) }
  }

  async getOr<F>(key: string, fallback: F): Promise<V | F> {
    const res = await this.get(key)

    return res.kind === "found" ? res.value : fallback
  }

  /** @throws NotFoundError when the key is absent. */
  async getItem(key: string): Promise<V> {
    const res = await this.get(key)

    if (res.kind === "not_found") throw new NotFoundError(key)

    return res.value
  }

  async set(key: string, value: V): Promise<void> {
    this.assertKey(key)
    assertWithinSizeLimit("value", value, this.opts.maxStringSize)

    const command = await this.commands.plainSet(
      this.keyCodec.format(key),
      this.envelope.encode(value),
    )

    await this.scope.set(command)
  }

  /**
   * Removes `key`. Absent keys are ignored unless `raiseOnMissingDelete` is
   * set, in which case NotFoundError is thrown. Inside a pipeline that check
   * runs as an EXISTS before the DEL is queued.
   */
  async delete(key: string): Promise<void> {
    this.assertKey(key)

    const formatted = this.keyCodec.format(key)
    const command = this.commands.del([formatted])

    if (!this.opts.raiseOnMissingDelete) {
      await this.scope.del(command)
      return
    }

    if (this.scope.active && (await this.deps.client.exists(formatted)) === 0) {
      throw new NotFoundError(key)
    }

    const res = await this.scope.del(command)

    if (res.kind === "sent" && res.reply === 0) throw new NotFoundError(key)
  }

  async has(key: string): Promise<boolean> {
    this.assertKey(key)

    return (await this.deps.client.exists(this.keyCodec.format(key))) > 0
  }

  /** Number of distinct keys found by a full scan. */
  async size(): Promise<number> {
    const seen = new Set(await this.scanner.collect("", { full: true, operation: "size" }))

    return seen.size
  }

  async *keys(): AsyncGenerator<string, void, undefined> {
    for await (const formatted of this.scanner.scan("", { operation: "keys" })) {
      yield this.keyCodec.parse(formatted)
    }
  }

  /** Keys that expire or are deleted while the scan runs are skipped. */
  async *items(): AsyncGenerator<DictEntry<V>, void, undefined> {
    for await (const formatted of this.scanner.scan("", { operation: "items" })) {
      const raw = await this.deps.client.get(formatted)

      if (raw === null) continue

      const key = this.keyCodec.parse(formatted)

      yield [key, this.decode(key, raw)]
    }
  }

  async *values(): AsyncGenerator<V, void, undefined> {
    for await (const [, value] of this.items()) yield value
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return this.keys()
  }

  /**
   * Keys in reverse scan order. The store keeps no insertion order, so this
   * is not the reverse of the order keys were written in.
   */
  async keysReversed(): Promise<string[]> {
    const keys: string[] = []

    for await (const key of this.keys()) keys.push(key)

    return keys.reverse()
  }

  /** First key starting with `searchTerm`, or undefined. */
  async key(searchTerm = ""): Promise<string | undefined> {
    const formatted = await this.scanner.first(searchTerm, "key")

    return formatted === undefined ? undefined : this.keyCodec.parse(formatted)
  }

  async toMap(): Promise<Map<string, V>> {
    const out = new Map<string, V>()

    for await (const [key, value] of this.items()) out.set(key, value)

    return out
  }

  async toObject(): Promise<Record<string, V>> {
    return Object.fromEntries(await this.toMap())
  }

  /** A plain object snapshot; the dict itself is not duplicated. */
  async copy(): Promise<Record<string, V>> {
    return this.toObject()
  }

  async clear(): Promise<void> {
    const keys = await this.scanner.collect("", { full: true, operation: "clear" })

    if (keys.length === 0) return

    await this.pipeline(async () => {
      for (const batch of chunk(keys, this.opts.batchSizeHint)) {
        await this.scope.del(this.commands.del(batch))
      }
    })
  }

  /**
   * Removes `key` and returns its value in one GETDEL.
   *
   * @throws NotFoundError when the key is absent and no fallback was given.
   */
  pop(key: string): Promise<V>
  pop<F>(key: string, fallback: F): Promise<V | F>
  async pop<F>(key: string, ...fallback: [] | [F]): Promise<V | F> {
    this.assertKey(key)

    const raw = await this.take(this.keyCodec.format(key))

    if (raw !== null) return this.decode(key, raw)
    if (fallback.length === 1) return fallback[0]

    throw new NotFoundError(key)
  }

  /**
   * Removes and returns some entry. Which one is up to the store's scan
   * order; when another client takes the chosen key first, another is
   * picked.
   *
   * @throws NotFoundError when the dict is empty.
   */
  async popItem(): Promise<DictEntry<V>> {
    for (;;) {
      const formatted = await this.scanner.first("", "popItem")

      if (formatted === undefined) throw new NotFoundError(undefined)

      const key = this.keyCodec.parse(formatted)
      const raw = await this.take(formatted)

      if (raw !== null) return [key, this.decode(key, raw)]

      this.logger.debug("Key vanished before it could be taken, retrying", {
        operation: "popItem",
        key,
      })
    }
  }

  /**
   * Stores `value` unless `key` already holds one, and returns whichever
   * value the key ends up with. Concurrent callers all get the winner's value.
   */
  async setDefault(key: string, value: V): Promise<V> {
    this.assertKey(key)
    assertWithinSizeLimit("value", value, this.opts.maxStringSize)

    const command = this.commands.setIfAbsent(
      this.keyCodec.format(key),
      this.envelope.encode(value),
    )

    this.logger.debug("Sending command", { operation: "setDefault", args: toArgs(command) })

    const previous = await this.deps.client.set(command.key, command.value, command.options)

    return previous === null ? value : this.decode(key, previous)
  }

  /** Sets every entry inside one pipeline. */
  async update(entries: Mapping<V> | Iterable<DictEntry<V>>): Promise<void> {
    const list = isIterable<DictEntry<V>>(entries) ? [...entries] : entriesOf(entries)

    await this.pipeline(async () => {
      for (const [key, value] of list) await this.set(key, value)
    })
  }

  async fromKeys(keys: Iterable<string>, value: V): Promise<this> {
    for (const key of keys) await this.set(key, value)

    return this
  }

  /** Same keys with deep-equal values. */
  async equals(other: DictOperand<V>): Promise<boolean> {
    const mine = await this.toMap()
    const theirs = new Map(await this.operandEntries(other))

    if (mine.size !== theirs.size) return false

    for (const [key, value] of mine) {
      if (!theirs.has(key) || !isEqual(value, theirs.get(key))) return false
    }

    return true
  }

  /** Entries of this dict overlaid with those of `other`. */
  async union(other: DictOperand<V>): Promise<Record<string, V>> {
    const theirs = await this.operandEntries(other)

    return { ...(await this.toObject()), ...Object.fromEntries(theirs) }
  }

  /** Entries of `other` overlaid with those of this dict. */
  async unionOnto(other: DictOperand<V>): Promise<Record<string, V>> {
    const theirs = await this.operandEntries(other)

    return { ...Object.fromEntries(theirs), ...(await this.toObject()) }
  }

  /** Writes every entry of `other` into this dict. */
  async assign(other: DictOperand<V>): Promise<this> {
    await this.update(await this.operandEntries(other))

    return this
  }

  async chainSet(parts: readonly string[], value: V): Promise<void> {
    await this.set(chainKey(parts), value)
  }

  async chainGet(parts: readonly string[]): Promise<V> {
    return this.getItem(chainKey(parts))
  }

  async chainDel(parts: readonly string[]): Promise<void> {
    await this.delete(chainKey(parts))
  }

  /** Values of every key starting with `prefix`, in scan order. */
  async multiGet(prefix: string): Promise<V[]> {
    const entries = await this.prefixEntries(prefix, "multiGet")

    return entries.map(([, value]) => value)
  }

  async multiChainGet(parts: readonly string[]): Promise<V[]> {
    return this.multiGet(chainKey(parts))
  }

  /**
   * Entries under `prefix`, keyed by what follows the prefix.
   *
   * @example
   * // with "foo:bar" = 1 and "foo:baz" = 2
   * await dict.multiDict("foo:") // { bar: 1, baz: 2 }
   */
  async multiDict(prefix: string): Promise<Record<string, V>> {
    const entries = await this.prefixEntries(prefix, "multiDict")

    return Object.fromEntries(
      entries.map(([formatted, value]) => [this.keyCodec.relativeTo(prefix, formatted), value]),
    )
  }

  /**
   * Deletes every key starting with `prefix`. Returns the number of keys
   * removed, or inside a pipeline the number of keys queued for removal.
   */
  async multiDel(prefix: string): Promise<number> {
    const keys = await this.scanner.collect(prefix, { operation: "multiDel" })
    let removed = 0

    for (const batch of chunk(keys, this.opts.batchSizeHint)) {
      const res = await this.scope.del(this.commands.del(batch))

      removed += res.kind === "sent" ? res.reply : batch.length
    }

    return removed
  }

  /** Remaining seconds, or undefined when the key is absent or never expires. */
  async getTtl(key: string): Promise<number | undefined> {
    this.assertKey(key)

    const ttl = await this.deps.client.ttl(this.keyCodec.format(key))

    return ttl < 0 ? undefined : ttl
  }

  /**
   * Runs `body` with `ttl` as the dict's expiry, then restores the previous
   * one. Pass undefined to write without expiry for the duration.
   */
  async withExpiration<R>(ttl: DictTtl | undefined, body: () => Promise<R>): Promise<R> {
    return this.ttl.override(ttl, body)
  }

  /**
   * Queues the writes made by `body` and sends them in one round trip when
   * the outermost pipeline exits, even if `body` throws.
   *
   * @throws PipelineFlushError when sending the batch fails.
   */
  async pipeline<R>(body: () => Promise<R>): Promise<R> {
    return this.scope.run(body)
  }

  /**
   * Makes instances of `type` storable under the tag `type.name`.
   *
   * Without explicit functions the instance method `customEncodeMethod` and
   * the static method `customDecodeMethod` are used.
   */
  extendType<T extends object>(type: StorableClass<T>, opts: ExtendTypeOptions<T> = {}): this {
    this.registry.extend(type, {
      encodeMethodName: this.opts.customEncodeMethod,
      decodeMethodName: this.opts.customDecodeMethod,
      ...opts,
    })

    return this
  }

  /** INFO reply as a flat record; section headers are dropped. */
  async serverInfo(section?: string): Promise<Record<string, string>> {
    const reply = await this.deps.client.info(section)
    const out: Record<string, string> = {}

    for (const line of reply.split(/\r?\n/)) {
      if (line === "" || line.startsWith("#")) continue

      const at = line.indexOf(":")
      if (at === -1) continue

      out[line.slice(0, at)] = line.slice(at + 1)
    }

    return out
  }

  private async take(formatted: string): Promise<string | null> {
    const command = this.commands.take(formatted)

    this.logger.debug("Sending command", { args: toArgs(command) })

    return this.deps.client.getDel(command.key)
  }

  private async prefixEntries(
    prefix: string,
    operation: string,
  ): Promise<[formatted: string, value: V][]> {
    const keys = await this.scanner.collect(prefix, { operation })
    const out: [string, V][] = []

    for (const batch of chunk(keys, this.opts.batchSizeHint)) {
      const raws = await this.deps.client.mGet(batch)

      for (const [i, formatted] of batch.entries()) {
        const raw = raws[i] ?? null

        if (raw !== null) out.push([formatted, this.decode(this.keyCodec.parse(formatted), raw)])
      }
    }

    return out
  }

  private async operandEntries(other: DictOperand<V>): Promise<DictEntry<V>[]> {
    if (other instanceof StoreDict) {
      const out: DictEntry<V>[] = []

      for await (const entry of other.items()) out.push(entry)

      return out
    }

    return entriesOf(other)
  }

  private decode(key: string, raw: string): V {
    const res = this.deps.schema.safeParse(this.envelope.decode(raw))

    if (!res.success) {
      throw new ValidationError(
        `Stored value for "${key}" does not match the dict schema\n${z.prettifyError(res.error)}`,
        { namespace: this.namespace, key },
        res.error,
      )
    }

    return res.data
  }

  private assertKey(key: string): void {
    assertWithinSizeLimit("key", key, this.opts.maxStringSize)
  }
}

function isIterable<T>(value: object): value is Iterable<T> {
  return Symbol.iterator in value
}

function isReadonlyMap<T>(value: Mapping<T>): value is ReadonlyMap<string, T> {
  return value instanceof Map
}

function entriesOf<T>(other: Mapping<T>): DictEntry<T>[] {
  if (isReadonlyMap(other)) return [...other.entries()]

  if (!isPlainObject(other)) {
    throw new TypeMismatchError("Expected a Map, a plain object or a StoreDict", {
      received: typeof other,
    })
  }

  return recordEntries<T>(other)
}

function recordEntries<T>(record: Readonly<Record<string, T>>): DictEntry<T>[] {
  return Object.entries(record)
}

function assertValidOptions(opts: StoreDictOptions): void {
  if (!Number.isInteger(opts.batchSizeHint) || opts.batchSizeHint < 1) {
    throw new ValidationError("batchSizeHint must be a positive integer", {
      batchSizeHint: opts.batchSizeHint,
    })
  }

  if (!Number.isInteger(opts.maxStringSize) || opts.maxStringSize < 1) {
    throw new ValidationError("maxStringSize must be a positive integer", {
      maxStringSize: opts.maxStringSize,
    })
  }
}
