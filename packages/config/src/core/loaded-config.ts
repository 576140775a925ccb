/** A validated configuration that remembers which source set each key. */
export class LoadedConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  constructor(
    value: T,
    private readonly origins: ReadonlyMap<string, string>,
    private readonly sourceNames: readonly string[],
    private readonly suppliedKeys: readonly string[],
  ) {
    this.value = Object.freeze(value)
  }

  /** The source that won for `key`, or `"default"` when the schema filled it in. */
  explain(key: keyof T & string): string {
    return this.origins.get(key) ?? "default"
  }

  /** Sources that won at least one key, in the order they were read. */
  sourcesUsed(): string[] {
    const winners = new Set(this.origins.values())
    return this.sourceNames.filter((name) => winners.has(name))
  }

  /** Keys some source supplied that the schema does not know; they were dropped. */
  unknownKeys(): string[] {
    return this.suppliedKeys.filter((key) => !(key in this.value))
  }
}
