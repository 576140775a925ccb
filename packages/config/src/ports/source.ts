/** Raw key/value pairs from one place. Validation happens after all sources merged. */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. `toml:config.toml` or `env`. */
  readonly name: string

  /** An `undefined` value counts as not provided. */
  read(): Promise<Record<string, unknown>>
}
