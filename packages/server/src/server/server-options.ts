import type { Clock, Milliseconds } from "@filegate/clock"
import type { Logger } from "@filegate/logger"
import type { ErrorMappings } from "../errors/error-response"
import type { LifecycleHook } from "../lifecycle/hooks"
import type { ListenFn } from "../lifecycle/listen"
import type { ProcessEvents } from "../lifecycle/signals"
import type { ReadinessCheck } from "../routes/health"
import type { Application } from "./application"

export interface ServerDependencies {
  clock: Clock
  logger: Logger
  /** Binds the app to a socket. Defaults to @hono/node-server. */
  listen?: ListenFn
  /** Where signal and crash listeners go. Defaults to `process`. */
  processEvents?: ProcessEvents
}

export interface ServerOptions {
  port: number
  /** @default "0.0.0.0" */
  host?: string
  /** @default no deadline */
  startupTimeoutMs?: Milliseconds
  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  /** Status and message per error code; unmapped codes answer 500. */
  errorMappings: ErrorMappings

  /** Add the upload CORS headers to every routed response. @default false */
  cors?: boolean

  /** Run on each `GET /ready`, in order, until one fails. */
  readinessChecks?: ReadinessCheck[]
  /** Per readiness check. @default 5_000 */
  readinessTimeoutMs?: Milliseconds

  routes: (app: Application) => void
  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedServerOptions = Required<ServerOptions>

/** Longest delay setTimeout accepts. */
const NO_DEADLINE: Milliseconds = 2_147_483_647

export function resolveServerOptions(options: ServerOptions): ResolvedServerOptions {
  return {
    port: options.port,
    host: options.host ?? "0.0.0.0",
    startupTimeoutMs: options.startupTimeoutMs ?? NO_DEADLINE,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? 10_000,
    errorMappings: options.errorMappings,
    cors: options.cors ?? false,
    readinessChecks: options.readinessChecks ?? [],
    readinessTimeoutMs: options.readinessTimeoutMs ?? 5_000,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
