export { ConfigSourceError, ConfigValidationError } from "./core/config-errors"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { LoadedConfig } from "./core/loaded-config"
export type { ConfigSource } from "./ports/source"
export { type EnvSourceOptions, EnvSource } from "./sources/env-source"
export { type TomlSourceOptions, TomlSource } from "./sources/toml-source"
