import { routePath } from "hono/route"
import type { Middleware } from "../server/application"

/** One `Request completed` entry per request; 5xx go out at error. */
export function accessLogMiddleware(): Middleware {
  return async (c, next) => {
    const startedAt = performance.now()

    await next()

    const status = c.res.status
    const remoteIp = c.get("remoteIp")
    const userAgent = c.req.header("User-Agent")

    const fields = {
      route: routePath(c) || c.req.path,
      status,
      durationMs: Math.round(performance.now() - startedAt),
      ...(remoteIp !== undefined && { remoteIp }),
      ...(userAgent !== undefined && { userAgent }),
    }

    if (status >= 500) {
      c.get("logger").error("Request completed", fields)
    } else {
      c.get("logger").info("Request completed", fields)
    }
  }
}
