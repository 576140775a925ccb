import { type Clock, SystemClock } from "@filegate/clock"
import { createPinoLogger, type Logger } from "@filegate/logger"
import type { AppConfig } from "../config"

/** Process-wide services with no outside dependencies. */
export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices({ logging }: AppConfig): CoreServices {
  return {
    clock: new SystemClock(),
    logger: createPinoLogger(
      { level: logging.level, prettify: logging.prettify },
      {},
      { service: "filegate" },
    ),
  }
}
