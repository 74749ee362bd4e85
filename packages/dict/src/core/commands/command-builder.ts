import type { StoreClient, StoreSetOptions } from "../../ports/store-client"
import type { DelCommand, GetDelCommand, SetCommand } from "./store-command"
import type { TtlPolicy } from "./ttl-policy"

export type CommandBuilderDeps = {
  client: StoreClient
  ttl: TtlPolicy
}

/**
 * Builds the store commands behind dict writes, applying the TTL policy.
 */
export class CommandBuilder {
  constructor(private readonly deps: CommandBuilderDeps) {}

  /**
   * SET with `KEEPTTL` when expirations are preserved and the key already
   * exists, otherwise with `EX` when an expiry is configured.
   *
   * The EXISTS check runs on the live client, so it does not see writes
   * still queued in a pipeline.
   */
  async plainSet(key: string, value: string): Promise<SetCommand> {
    const { client, ttl } = this.deps
    const options: StoreSetOptions = {}

    if (ttl.preserveExpiration && (await client.exists(key)) > 0) {
      options.KEEPTTL = true
    } else {
      const seconds = ttl.expireSeconds()
      if (seconds !== undefined) options.EX = seconds
    }

    return { name: "SET", key, value, options }
  }

  /**
   * One `SET NX GET`: stores `value` only when `key` is absent and replies
   * with the previous value, or null when this write landed.
   */
  setIfAbsent(key: string, value: string): SetCommand {
    const { ttl } = this.deps
    const options: StoreSetOptions = { NX: true, GET: true }
    const seconds = ttl.expireSeconds()

    if (seconds !== undefined) {
      options.EX = seconds
    } else if (ttl.preserveExpiration) {
      options.KEEPTTL = true
    }

    return { name: "SET", key, value, options }
  }

  take(key: string): GetDelCommand {
    return { name: "GETDEL", key }
  }

  del(keys: readonly string[]): DelCommand {
    return { name: "DEL", keys }
  }
}
