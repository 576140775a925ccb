import type { Middleware } from "../server/application"

const IMPLEMENTATION_HEADERS = ["Server", "X-Powered-By"]

/** Keeps responses from naming the software behind them. */
export function headerSuppressionMiddleware(): Middleware {
  return async (c, next) => {
    await next()

    for (const name of IMPLEMENTATION_HEADERS) c.res.headers.delete(name)
  }
}
