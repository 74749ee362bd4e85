import { createClient, type RedisClientOptions } from "redis"

import type { RedisStoreClient } from "./redis-client"

export type RedisStoreClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Builds a node-redis client for a StoreDict.
 *
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisStoreClient(options: RedisStoreClientOptions): RedisStoreClient {
  return createClient({ ...options, url: options.url }) as unknown as RedisStoreClient
}
