import { serve } from "@hono/node-server"
import type { Logger } from "@filegate/logger"
import type { Application } from "../server/application"
import type { Closeable } from "./shutdown"

export type ListenAddress = {
  host: string
  port: number
}

export type ListenFn = (app: Application, address: ListenAddress, logger: Logger) => Closeable

export const listen: ListenFn = (app, { host, port }, logger) => {
  const server = serve({ fetch: app.fetch, hostname: host, port })

  logger.info("Listening", { url: `http://${host.includes(":") ? `[${host}]` : host}:${port}` })

  return server
}
