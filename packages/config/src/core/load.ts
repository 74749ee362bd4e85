import { BaseError } from "@keel/errors"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Defaults to a single EnvSource over `process.env`. */
  sources?: readonly ConfigSource[]
}

export class ConfigValidationError extends BaseError<"config_invalid"> {}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {
        code: "config_invalid",
        context: { sources: [...new Set(Object.values(provenance))] },
        cause: result.error,
        isOperational: false,
      },
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
