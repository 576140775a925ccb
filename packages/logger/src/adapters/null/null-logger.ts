import type { LogFields, Logger } from "../../ports/logger"

/** Drops every entry. */
export class NullLogger implements Logger {
  trace(_message: string, _fields?: LogFields): void {}
  debug(_message: string, _fields?: LogFields): void {}
  info(_message: string, _fields?: LogFields): void {}
  warn(_message: string, _fields?: LogFields): void {}
  error(_message: string, _fields?: LogFields): void {}
  fatal(_message: string, _fields?: LogFields): void {}

  child(_bindings: LogFields): Logger {
    return this
  }
}
