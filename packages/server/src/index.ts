export type { ErrorMapping, ErrorMappings, ErrorResponse } from "./errors/error-response"
export type { StatusCode } from "./http/status-codes"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/hooks"
export type { ListenAddress, ListenFn } from "./lifecycle/listen"
export type { Closeable, StopResult } from "./lifecycle/shutdown"
export type { ProcessEvents } from "./lifecycle/signals"
export { CORS_HEADERS } from "./middleware/cors"
export { REQUEST_ID_HEADER } from "./middleware/request-context"
export type { ReadinessCheck } from "./routes/health"
export type { Application, Context, Middleware, RequestHandler } from "./server/application"
export { createServer, Server, type ServerHandle, StartupError } from "./server/server"
export type { ServerDependencies, ServerOptions } from "./server/server-options"
export type { RequestVariables } from "./types/context"
