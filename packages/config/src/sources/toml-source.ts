import { readFile } from "node:fs/promises"
import path from "node:path"
import { parse } from "smol-toml"
import { ConfigSourceError } from "../core/config-errors"
import type { ConfigSource } from "../ports/source"

export type TomlSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string
  /** @default process.cwd() */
  cwd?: string
}

/** Top-level keys of one TOML file. A missing or malformed file is an error. */
export class TomlSource implements ConfigSource {
  readonly name: string

  constructor(private readonly options: TomlSourceOptions) {
    this.name = `toml:${options.file}`
  }

  async read(): Promise<Record<string, unknown>> {
    const file = path.resolve(this.options.cwd ?? process.cwd(), this.options.file)

    try {
      return { ...parse(await readFile(file, "utf8")) }
    } catch (err) {
      throw new ConfigSourceError(file, err)
    }
  }
}
