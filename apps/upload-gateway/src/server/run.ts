import type { ServerHandle } from "@filegate/server"
import { type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "./build-server"

/** Loads configuration, then serves until SIGINT or SIGTERM. */
export async function run(options: AppContextOptions = {}): Promise<ServerHandle> {
  const ctx = await createAppContext(options)
  const handle = await buildServer(ctx).setupProcessHandlers().start()

  ctx.services.core.logger.info("Upload gateway ready", {
    ...handle.address,
    uploadSubDir: ctx.config.files.uploadSubDir,
    mode: ctx.services.files.readStrategy.mode,
  })

  return handle
}
