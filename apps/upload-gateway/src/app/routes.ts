import type { Application } from "@filegate/server"
import { createFilesModule } from "../domains/files"
import type { AppConfig } from "./config"
import type { AppServices } from "./services"

/** The gateway's own routes; health routes come from the server package. */
export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  createFilesModule({ config, files: services.files }).register(app)
}
