import type { Logger } from "@filegate/logger"
import type { StopResult } from "./shutdown"

export type ProcessEvents = Pick<NodeJS.EventEmitter, "on" | "off">

export type ProcessHandlerOptions = {
  logger: Logger
  stop: () => Promise<StopResult>
  /** @default process */
  events?: ProcessEvents
  /** @default process.exit */
  exit?: (code: number) => void
  /** How long a stop triggered by a crash may run before the process exits anyway. */
  crashStopTimeoutMs?: number
}

const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const

/**
 * The first SIGINT or SIGTERM starts a graceful stop and later ones are
 * ignored. An uncaught exception or unhandled rejection stops the server and
 * exits with 1. Returns a function that removes the listeners.
 */
export function installProcessHandlers(options: ProcessHandlerOptions): () => void {
  const { logger, stop } = options
  const events = options.events ?? process
  const exit = options.exit ?? ((code: number) => process.exit(code))
  const crashStopTimeoutMs = options.crashStopTimeoutMs ?? 10_000

  let stopping = false

  const stopAndReport = async (reason: string): Promise<void> => {
    try {
      const result = await stop()

      if (!result.ok) {
        logger.error("Shutdown finished with failures", {
          reason,
          failureCount: result.failures.length,
          timedOut: result.timedOut,
        })
      }
    } catch (err) {
      logger.error("Shutdown threw", { reason, err })
    }
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    if (stopping) {
      logger.info("Already stopping, signal ignored", { signal })
      return
    }

    stopping = true
    logger.warn("Stopping on signal", { signal })
    void stopAndReport(signal)
  }

  const onCrash = (reason: string, err: unknown): void => {
    logger.fatal("Process crashed", { reason, err })

    if (stopping) {
      exit(1)
      return
    }

    stopping = true

    const deadline = setTimeout(() => {
      logger.fatal("Stop after crash did not finish in time", { timeoutMs: crashStopTimeoutMs })
      exit(1)
    }, crashStopTimeoutMs)
    deadline.unref()

    void stopAndReport(reason).finally(() => {
      clearTimeout(deadline)
      exit(1)
    })
  }

  const onUncaughtException = (err: Error): void => onCrash("uncaughtException", err)
  const onUnhandledRejection = (reason: unknown): void => onCrash("unhandledRejection", reason)

  for (const signal of STOP_SIGNALS) events.on(signal, onSignal)
  events.on("uncaughtException", onUncaughtException)
  events.on("unhandledRejection", onUnhandledRejection)

  return () => {
    for (const signal of STOP_SIGNALS) events.off(signal, onSignal)
    events.off("uncaughtException", onUncaughtException)
    events.off("unhandledRejection", onUnhandledRejection)
  }
}
