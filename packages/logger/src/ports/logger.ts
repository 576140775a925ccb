/** Structured fields attached to an entry; `err` is serialized with its cause chain. */
export type LogFields = Record<string, unknown>

export interface Logger {
  trace(message: string, fields?: LogFields): void
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
  fatal(message: string, fields?: LogFields): void

  /** A logger that stamps `bindings` on everything it writes, on top of what this one stamps. */
  child(bindings: LogFields): Logger
}
