import { z } from "zod"

import type { StoreDictOptions } from "../ports/dict-options"
import { StoreDict, type StoreDictDeps } from "./store-dict"

export type CreateStoreDictDeps = Omit<StoreDictDeps<unknown>, "schema">

/**
 * Creates a dict. Without a schema values come back as `unknown`; with one
 * they are checked and typed by it.
 */
export function createStoreDict<V>(
  deps: StoreDictDeps<V>,
  opts?: Partial<StoreDictOptions>,
): StoreDict<V>
export function createStoreDict(
  deps: CreateStoreDictDeps,
  opts?: Partial<StoreDictOptions>,
): StoreDict<unknown>
export function createStoreDict<V>(
  deps: CreateStoreDictDeps & { schema?: z.ZodType<V> },
  opts: Partial<StoreDictOptions> = {},
): StoreDict<V> | StoreDict<unknown> {
  const { schema, ...rest } = deps

  if (schema) return new StoreDict<V>({ ...rest, schema }, opts)

  return new StoreDict<unknown>({ ...rest, schema: z.unknown() }, opts)
}
