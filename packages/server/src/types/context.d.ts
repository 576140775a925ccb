import type { Logger } from "@filegate/logger"

/** Filled in by the request context middleware before any route runs. */
export type RequestVariables = {
  requestId: string
  remoteIp: string
  logger: Logger
}

declare module "hono" {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  interface ContextVariableMap extends RequestVariables {}
}
