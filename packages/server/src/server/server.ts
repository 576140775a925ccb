import { BaseError } from "@filegate/errors"
import { errorHandler } from "../errors/error-handler"
import { type HookFailure, runHooks } from "../lifecycle/hooks"
import { type ListenAddress, listen } from "../lifecycle/listen"
import { type Closeable, type StopResult, stopGracefully } from "../lifecycle/shutdown"
import { installProcessHandlers } from "../lifecycle/signals"
import { accessLogMiddleware } from "../middleware/access-log"
import { corsMiddleware } from "../middleware/cors"
import { headerSuppressionMiddleware } from "../middleware/header-suppression"
import { requestContextMiddleware } from "../middleware/request-context"
import { registerHealthRoutes } from "../routes/health"
import { type Application, createApp } from "./application"
import {
  type ResolvedServerOptions,
  resolveServerOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export interface ServerHandle {
  address: ListenAddress
  /** Idempotent; every call gets the same result. */
  stop(): Promise<StopResult>
}

export class StartupError extends BaseError<"startup_failed"> {
  constructor(
    readonly failures: HookFailure[],
    readonly timedOut: boolean,
  ) {
    const hooks = failures.map((f) => f.hook)

    super(timedOut ? "Startup timed out" : `Startup hook failed: ${hooks.join(", ")}`, {
      code: "startup_failed",
      context: { hooks, timedOut },
      cause: failures[0]?.error,
    })
  }
}

const NOT_RUNNING: StopResult = { ok: true, failures: [], timedOut: false }

export class Server {
  readonly app: Application = createApp()

  private built = false
  private starting = false
  private ready = false
  private handle?: ServerHandle
  private removeProcessHandlers?: () => void

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
  ) {}

  /**
   * Wires health routes, middleware, routes and the error handler, in that
   * order, so health checks bypass the middleware. Safe to call repeatedly;
   * `start()` calls it.
   */
  build(): Application {
    if (this.built) return this.app
    this.built = true

    const { app, options } = this
    const { logger } = this.deps

    registerHealthRoutes(app, {
      checks: options.readinessChecks,
      timeoutMs: options.readinessTimeoutMs,
      isReady: () => this.ready,
      logger,
    })

    app.use(headerSuppressionMiddleware())
    if (options.cors) app.use(corsMiddleware())
    app.use(requestContextMiddleware(logger))
    app.use(accessLogMiddleware())

    options.routes(app)
    app.onError(errorHandler(options.errorMappings, logger))

    return app
  }

  /** Stop on SIGINT/SIGTERM and on crashes. Listeners go away once the server stops. */
  setupProcessHandlers(): this {
    this.removeProcessHandlers ??= installProcessHandlers({
      logger: this.deps.logger,
      events: this.deps.processEvents,
      stop: () => this.handle?.stop() ?? this.stopWhileIdle(),
    })

    return this
  }

  /** Runs the start hooks, then listens. Rejects with {@link StartupError} without listening. */
  async start(): Promise<ServerHandle> {
    if (this.starting || this.handle) throw new Error("Server already started")
    this.starting = true

    try {
      const { clock, logger } = this.deps
      const { failures, timedOut } = await runHooks(this.options.startHooks, {
        phase: "startup",
        clock,
        logger,
        deadlineMs: clock.nowMs() + this.options.startupTimeoutMs,
        stopOnFailure: true,
      })

      if (failures.length > 0 || timedOut) throw new StartupError(failures, timedOut)

      const address = { host: this.options.host, port: this.options.port }
      const listening = (this.deps.listen ?? listen)(this.build(), address, logger)

      this.ready = true
      this.handle = this.handleFor(listening, address)

      return this.handle
    } finally {
      this.starting = false
    }
  }

  isReady(): boolean {
    return this.ready
  }

  private handleFor(listening: Closeable, address: ListenAddress): ServerHandle {
    let stopped: Promise<StopResult> | undefined

    return {
      address,
      stop: () => {
        stopped ??= this.stop(listening)
        return stopped
      },
    }
  }

  private async stop(listening: Closeable): Promise<StopResult> {
    this.ready = false

    try {
      return await stopGracefully({
        server: listening,
        stopHooks: this.options.stopHooks,
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.shutdownTimeoutMs,
      })
    } finally {
      this.removeProcessHandlers?.()
      this.removeProcessHandlers = undefined
    }
  }

  private stopWhileIdle(): Promise<StopResult> {
    this.deps.logger.warn("Stop requested before the server started")
    return Promise.resolve(NOT_RUNNING)
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveServerOptions(options))
}
