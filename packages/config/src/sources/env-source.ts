import type { ConfigSource } from "../ports/source"

export type EnvSourceOptions = {
  /** Environment variable to config key, e.g. `{ AWS_ACCESS_KEY_ID: "s3AccessKey" }`. */
  keys: Record<string, string>
  /** @default process.env */
  env?: Record<string, string | undefined>
}

/** Only the listed variables are read; empty ones count as unset. */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions) {}

  async read(): Promise<Record<string, unknown>> {
    const env = this.options.env ?? process.env

    return Object.fromEntries(
      Object.entries(this.options.keys).flatMap(([variable, key]): [string, string][] => {
        const value = env[variable]
        return value === undefined || value === "" ? [] : [[key, value]]
      }),
    )
  }
}
