import type { Clock, UnixMs } from "@filegate/clock"
import type { Logger } from "@filegate/logger"
import { type HookFailure, type LifecycleHook, runHooks } from "./hooks"

/** The part of a Node HTTP server that shutdown needs. */
export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type StopResult = {
  ok: boolean
  failures: HookFailure[]
  /** Some hooks never ran. Connections still open at that point are left to the process exit. */
  timedOut: boolean
}

export type GracefulStop = {
  server: Closeable
  stopHooks: LifecycleHook[]
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

/** Closes the listener first, then runs every stop hook, even after a failure. */
export async function stopGracefully(stop: GracefulStop): Promise<StopResult> {
  stop.logger.warn("Stopping server")

  const closeListener: LifecycleHook = {
    name: "http:close",
    fn: ({ signal }) => closeUnlessAborted(stop.server, signal),
  }

  const { failures, timedOut } = await runHooks([closeListener, ...stop.stopHooks], {
    phase: "shutdown",
    clock: stop.clock,
    logger: stop.logger,
    deadlineMs: stop.deadlineMs,
    stopOnFailure: false,
  })

  stop.logger.info("Server stopped", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

/** `close()` waits for keep-alive sockets to drain; an abort stops the wait early. */
function closeUnlessAborted(server: Closeable, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      resolve()
      return
    }

    signal.addEventListener("abort", () => resolve(), { once: true })
    server.close((err) => (err ? reject(err) : resolve()))
  })
}
