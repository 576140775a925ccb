import type { Middleware } from "../server/application"

/** The policy XMPP web clients need to upload from any origin. */
export const CORS_HEADERS = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "OPTIONS, HEAD, GET, PUT",
  "Access-Control-Allow-Headers": "Authorization, Content-Type",
  "Access-Control-Allow-Credentials": "true",
  "Access-Control-Max-Age": "7200",
} as const

/**
 * Stamps {@link CORS_HEADERS} on the response after the route ran, so error
 * responses carry them too. OPTIONS is answered by the routes themselves.
 */
export function corsMiddleware(): Middleware {
  return async (c, next) => {
    await next()

    for (const [name, value] of Object.entries(CORS_HEADERS)) c.res.headers.set(name, value)
  }
}
