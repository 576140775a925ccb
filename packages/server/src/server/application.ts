import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"

/** The Hono instance routes are registered on. */
export type Application = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler

export const createApp = (): Application => new Hono()
