export { createRedisStoreClient, type RedisStoreClientOptions } from "./adapters/redis/create"
export type { RedisStoreClient } from "./adapters/redis/redis-client"
export { globMatch, globToRegExp } from "./adapters/memory/glob-match"
export {
  MemoryStoreClient,
  type MemoryStoreClientDeps,
  type MemoryStoreClientOptions,
} from "./adapters/memory/memory-store-client"
export {
  type LoadStoreDictConfigOptions,
  loadStoreDictConfig,
  type StoreDictConfig,
  storeDictConfigSchema,
  toStoreDictOptions,
} from "./config/store-dict-config"
export { isPlainObject, registerBuiltinTypes } from "./core/codec/builtin-types"
export { defaultDecoder } from "./core/codec/default-decoder"
export { ENVELOPE_SEPARATOR, EnvelopeCodec } from "./core/codec/envelope"
export { instanceMatcher, methodDecoder, methodEncoder } from "./core/codec/method-codec"
export {
  createTypeRegistry,
  defaultTypeRegistry,
  type EncodedValue,
  TypeRegistry,
} from "./core/codec/type-registry"
export { CommandBuilder } from "./core/commands/command-builder"
export * from "./core/commands/store-command"
export { assertValidTtl, TtlPolicy, toExpireSeconds } from "./core/commands/ttl-policy"
export { type CreateStoreDictDeps, createStoreDict } from "./core/create-store-dict"
export * from "./core/errors"
export { chainKey, insertionOrderKey, KEY_SEPARATOR, KeyCodec } from "./core/keys/key-codec"
export { type Dispatch, PipelineScope } from "./core/pipeline/pipeline-scope"
export { KeyScanner, type ScanOptions } from "./core/scan/key-scanner"
export { type DictOperand, StoreDict, type StoreDictDeps } from "./core/store-dict"
export { assertWithinSizeLimit } from "./core/validation/size-limit"
export type * from "./ports/codec"
export * from "./ports/dict-options"
export type * from "./ports/dict-result"
export type * from "./ports/store-client"
