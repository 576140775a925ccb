import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  level: LogLevelName
  /** Colourised single-line output through pino-pretty, for a terminal. */
  prettify?: boolean
}
