import { type ConfigSource, EnvSource, loadConfig, TomlSource } from "@filegate/config"
import { parseListenAddress } from "./listen-address"
import { type AppConfig, type FileConfig, fileSchema } from "./schema"

export const DEFAULT_CONFIG_FILE = "./config.toml"

/** Standard AWS credential variables take precedence over the file. */
const CREDENTIAL_ENV_KEYS = {
  AWS_ACCESS_KEY_ID: "s3AccessKey",
  AWS_SECRET_ACCESS_KEY: "s3Secret",
}

export type LoadAppConfigOptions = {
  file?: string
  env?: Record<string, string | undefined>
  cwd?: string
}

export type LoadedAppConfig = {
  config: AppConfig

  /** Provenance worth reporting once a logger exists. */
  report: {
    sources: string[]
    unknownKeys: string[]
    credentialsFromEnv: boolean
  }
}

export function mapFileToConfig(file: FileConfig): AppConfig {
  const { host, port } = parseListenAddress(file.listenport)

  return {
    server: {
      host,
      port,
      shutdownTimeoutMs: file.shutdownTimeoutMs,
    },
    logging: {
      level: file.logLevel,
      prettify: file.logPretty,
    },
    files: {
      secret: file.secret,
      uploadSubDir: file.uploadSubDir,
      proxyMode: file.proxyMode,
    },
    s3: {
      endpoint: file.s3Endpoint,
      accessKeyId: file.s3AccessKey,
      secretAccessKey: file.s3Secret,
      tls: file.s3TLS,
      bucket: file.s3Bucket,
      region: file.s3Region,
      forcePathStyle: file.s3ForcePathStyle,
    },
  }
}

export async function loadAppConfig(
  options: LoadAppConfigOptions = {},
): Promise<LoadedAppConfig> {
  const sources: ConfigSource[] = [
    new TomlSource({
      file: options.file ?? DEFAULT_CONFIG_FILE,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    }),
    new EnvSource({
      keys: CREDENTIAL_ENV_KEYS,
      env: options.env ?? process.env,
    }),
  ]

  const result = await loadConfig({ schema: fileSchema, sources })

  return {
    config: mapFileToConfig(result.value),
    report: {
      sources: result.sourcesUsed(),
      unknownKeys: result.unknownKeys(),
      credentialsFromEnv:
        result.explain("s3AccessKey") === "env" || result.explain("s3Secret") === "env",
    },
  }
}
