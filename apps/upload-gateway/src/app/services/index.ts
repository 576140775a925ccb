import { createFileServices, type FileServices } from "../../domains/files"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraServices } from "./infra"

export type DomainServices = {
  files: FileServices
}

export type AppServices = {
  core: CoreServices
} & DomainServices

export function createDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
): DomainServices {
  return {
    files: createFileServices(config, core, infra),
  }
}
