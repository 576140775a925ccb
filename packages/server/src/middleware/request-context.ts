import { randomUUID } from "node:crypto"
import type { Logger } from "@filegate/logger"
import type { Middleware } from "../server/application"

export const REQUEST_ID_HEADER = "X-Request-Id"

/**
 * Sets `requestId`, `remoteIp` and a request-scoped `logger` on the context
 * and echoes the request id back. A caller's `X-Request-Id` is reused.
 */
export function requestContextMiddleware(logger: Logger): Middleware {
  return async (c, next) => {
    const requestId = c.req.header(REQUEST_ID_HEADER)?.trim() || randomUUID()
    const remoteIp = remoteAddress(c.env)

    c.set("requestId", requestId)
    if (remoteIp !== undefined) c.set("remoteIp", remoteIp)
    c.set("logger", logger.child({ requestId, method: c.req.method, path: c.req.path }))

    await next()

    c.res.headers.set(REQUEST_ID_HEADER, requestId)
  }
}

/**
 * @hono/node-server passes the Node request as `env.incoming`. Not there
 * under `app.request()`. IPv4-mapped addresses are unwrapped.
 */
function remoteAddress(env: unknown): string | undefined {
  const address = field(field(field(env, "incoming"), "socket"), "remoteAddress")
  if (typeof address !== "string" || address === "") return undefined

  return address.startsWith("::ffff:") ? address.slice("::ffff:".length) : address
}

function field(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null && key in value
    ? Reflect.get(value, key)
    : undefined
}
