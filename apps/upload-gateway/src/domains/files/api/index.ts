import type { Application } from "@filegate/server"
import type { AppConfig } from "../../../app/config"
import type { FileServices } from "../composition"
import { fileRequestHandler } from "./file-request.handler"

type FilesModuleDeps = {
  config: AppConfig
  files: FileServices
}

export function createFilesModule(deps: FilesModuleDeps) {
  const { secret, uploadSubDir } = deps.config.files
  const mount = mountPath(uploadSubDir)

  return {
    name: "files",
    register: (app: Application) => {
      const handler = fileRequestHandler(deps.files, { secret, uploadSubDir })

      app.all(mount === "" ? "/" : mount, handler)
      app.all(`${mount}/*`, handler)
    },
  }
}

/** `upload`, `/upload/` and `upload/` all mount on `/upload`; keys are not affected. */
export function mountPath(uploadSubDir: string): string {
  const trimmed = uploadSubDir.replace(/^\/+|\/+$/g, "")

  return trimmed === "" ? "" : `/${trimmed}`
}
