import { type AppConfig, loadAppConfig, type LoadedAppConfig } from "./config"
import { type AppServices, createDomainServices, type DomainServices } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createInfraServices, type InfraServices } from "./services/infra"

export type AppContextOptions = {
  /** TOML file, resolved against `cwd`. */
  configFile?: string
  cwd?: string
  env?: Record<string, string | undefined>

  /** Replace whole config sections after loading. */
  configOverrides?: Partial<AppConfig>
  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraServices>
  domainOverrides?: Partial<DomainServices>
}

export type AppContext = {
  config: AppConfig
  infra: InfraServices
  services: AppServices
}

export async function createAppContext(
  options: AppContextOptions = {},
): Promise<AppContext> {
  const loaded = await loadAppConfig({
    ...(options.configFile !== undefined && { file: options.configFile }),
    ...(options.cwd !== undefined && { cwd: options.cwd }),
    ...(options.env !== undefined && { env: options.env }),
  })

  const config = freezeConfig({ ...loaded.config, ...options.configOverrides })

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  reportConfig(core, loaded.report)

  const infra = { ...createInfraServices(config, core), ...options.infraOverrides }
  const domains = { ...createDomainServices(config, core, infra), ...options.domainOverrides }

  return {
    config,
    infra,
    services: { core, ...domains },
  }
}

function freezeConfig(config: AppConfig): AppConfig {
  for (const section of Object.values(config)) Object.freeze(section)
  return Object.freeze(config)
}

function reportConfig(core: CoreServices, report: LoadedAppConfig["report"]): void {
  const { logger } = core

  logger.debug("Configuration loaded", { sources: report.sources })

  if (report.credentialsFromEnv) {
    logger.info("Loading AWS credentials from environment instead of config")
  }

  if (report.unknownKeys.length > 0) {
    logger.debug("Ignoring unknown configuration keys", { keys: report.unknownKeys })
  }
}
