import type { Logger } from "@filegate/logger"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraServices } from "../../../app/services/infra"
import { FileStore } from "../infra/file-store"
import { ProxyReadStrategy } from "../services/proxy-read-strategy"
import type { ReadStrategy } from "../services/read-strategy"
import { RedirectReadStrategy } from "../services/redirect-read-strategy"

export type FileServices = {
  logger: Logger
  fileStore: FileStore
  readStrategy: ReadStrategy
}

export function createFileServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): FileServices {
  const fileStore = new FileStore(
    { objectStorage: infra.objectStorage },
    { bucket: config.s3.bucket },
  )

  const readStrategy: ReadStrategy = config.files.proxyMode
    ? new ProxyReadStrategy({ fileStore, clock: core.clock })
    : new RedirectReadStrategy({ fileStore })

  return {
    logger: core.logger.child({ module: "files" }),
    fileStore,
    readStrategy,
  }
}
