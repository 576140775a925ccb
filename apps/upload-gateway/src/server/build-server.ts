import { createServer, type ErrorMapping, type Server } from "@filegate/server"
import type { AppContext } from "../app/create-context"
import { createStartHooks, createStopHooks } from "../app/lifecycle"
import { registerRoutes } from "../app/routes"
import type { FileErrorCode } from "../domains/files/model/files.errors"

/** Bodies XMPP clients have always received for each failure. */
export const FILE_ERROR_MAPPINGS = {
  signature_missing: { status: 403, message: "Needs HMAC" },
  signature_mismatch: { status: 403, message: "403 Forbidden" },
  method_not_allowed: { status: 405, message: "405 Method Not Allowed" },
  backend_error: { status: 502, message: "Backend Error" },
  storage_error: { status: 502, message: "Storage error" },
} satisfies Record<FileErrorCode, ErrorMapping>

export function buildServer(ctx: AppContext): Server {
  const { config, services } = ctx
  const { fileStore } = services.files

  return createServer(
    { clock: services.core.clock, logger: services.core.logger },
    {
      host: config.server.host,
      port: config.server.port,
      shutdownTimeoutMs: config.server.shutdownTimeoutMs,
      errorMappings: FILE_ERROR_MAPPINGS,
      cors: true,
      readinessChecks: [{ name: "bucket", fn: () => fileStore.exists() }],
      routes: (app) => registerRoutes(app, config, services),
      startHooks: createStartHooks(ctx),
      stopHooks: createStopHooks(ctx),
    },
  )
}
