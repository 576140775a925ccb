import pino, { type DestinationStream, type Logger as Pino, type LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogFields, Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

/** Where JSON lines go. Defaults to stdout; ignored when prettifying. */
export type PinoSink = {
  destination?: DestinationStream
}

const prettyTransport = {
  target: "pino-pretty",
  options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
}

function rootPino(options: LoggerOptions, sink: PinoSink): Pino {
  const config: PinoOptions = {
    level: options.level,
    serializers: { err: errWithCause },
  }

  if (options.prettify) return pino({ ...config, transport: prettyTransport })
  return sink.destination ? pino(config, sink.destination) : pino(config)
}

export class PinoLogger implements Logger {
  private constructor(private readonly pino: Pino) {}

  static create(options: LoggerOptions, sink: PinoSink = {}, bindings: LogFields = {}): PinoLogger {
    return new PinoLogger(rootPino(options, sink).child(bindings))
  }

  trace(message: string, fields: LogFields = {}): void {
    this.pino.trace(fields, message)
  }

  debug(message: string, fields: LogFields = {}): void {
    this.pino.debug(fields, message)
  }

  info(message: string, fields: LogFields = {}): void {
    this.pino.info(fields, message)
  }

  warn(message: string, fields: LogFields = {}): void {
    this.pino.warn(fields, message)
  }

  error(message: string, fields: LogFields = {}): void {
    this.pino.error(fields, message)
  }

  fatal(message: string, fields: LogFields = {}): void {
    this.pino.fatal(fields, message)
  }

  child(bindings: LogFields): Logger {
    return new PinoLogger(this.pino.child(bindings))
  }
}

export function createPinoLogger(
  options: LoggerOptions = { level: "info" },
  sink: PinoSink = {},
  bindings: LogFields = {},
): Logger {
  return PinoLogger.create(options, sink, bindings)
}
