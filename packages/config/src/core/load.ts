import { z } from "zod/mini"
import type { ConfigSource } from "../ports/source"
import { ConfigValidationError } from "./config-errors"
import { LoadedConfig } from "./loaded-config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: z.core.$ZodType<T>
  /** Read in order; a later source overrides an earlier one key by key. */
  sources: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>(
  options: LoadConfigOptions<T>,
): Promise<LoadedConfig<T>> {
  const merged: Record<string, unknown> = {}
  const origins = new Map<string, string>()

  for (const source of options.sources) {
    for (const [key, value] of Object.entries(await source.read())) {
      if (value === undefined) continue

      merged[key] = value
      origins.set(key, source.name)
    }
  }

  const parsed = z.safeParse(options.schema, merged)
  if (!parsed.success) throw new ConfigValidationError(z.prettifyError(parsed.error))

  return new LoadedConfig(
    parsed.data,
    origins,
    options.sources.map((source) => source.name),
    Object.keys(merged),
  )
}
