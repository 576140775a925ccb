export { NullLogger } from "./adapters/null/null-logger"
export { createPinoLogger, PinoLogger, type PinoSink } from "./adapters/pino/pino-logger"
export { type LogLevelName, logLevelNames } from "./ports/log-level"
export type { LogFields, Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
