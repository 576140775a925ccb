export { ListenAddressError, type ListenAddress, parseListenAddress } from "./listen-address"
export {
  DEFAULT_CONFIG_FILE,
  type LoadAppConfigOptions,
  type LoadedAppConfig,
  loadAppConfig,
  mapFileToConfig,
} from "./load-app-config"
export type { AppConfig, FileConfig } from "./schema"
