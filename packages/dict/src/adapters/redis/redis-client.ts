import type { StoreClient } from "../../ports/store-client"

/**
 * A node-redis client seen through the StoreClient port, plus the
 * connection lifecycle the caller owns.
 */
export type RedisStoreClient = StoreClient & {
  readonly isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>
}
