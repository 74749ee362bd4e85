import { type ConfigSource, DotenvSource, EnvSource, type IConfig, loadConfig } from "@keel/config"
import { logLevelNames } from "@keel/logger"
import { z } from "zod"

import type { StoreDictOptions } from "../ports/dict-options"

export const storeDictConfigSchema = z.object({
  DICT_NAMESPACE: z.string().min(1).default("main"),
  DICT_EXPIRE_SECONDS: z.coerce.number().int().positive().optional(),
  DICT_PRESERVE_EXPIRATION: z.stringbool().default(false),
  DICT_RAISE_ON_MISSING_DELETE: z.stringbool().default(false),
  DICT_BATCH_SIZE_HINT: z.coerce.number().int().positive().default(200),
  REDIS_URL: z.url({ protocol: /^rediss?$/ }).default("redis://localhost:6379"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
})

export type StoreDictConfig = z.infer<typeof storeDictConfigSchema>

export type LoadStoreDictConfigOptions = {
  /** Defaults to an optional `.env` in the working directory, then `process.env`. */
  sources?: readonly ConfigSource[]
}

export async function loadStoreDictConfig(
  opts: LoadStoreDictConfigOptions = {},
): Promise<IConfig<StoreDictConfig>> {
  return loadConfig({
    schema: storeDictConfigSchema,
    sources: opts.sources ?? [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
  })
}

export function toStoreDictOptions(config: IConfig<StoreDictConfig>): Partial<StoreDictOptions> {
  const expire = config.get("DICT_EXPIRE_SECONDS")

  return {
    namespace: config.get("DICT_NAMESPACE"),
    preserveExpiration: config.get("DICT_PRESERVE_EXPIRATION"),
    raiseOnMissingDelete: config.get("DICT_RAISE_ON_MISSING_DELETE"),
    batchSizeHint: config.get("DICT_BATCH_SIZE_HINT"),
    ...(expire !== undefined && { expire }),
  }
}
