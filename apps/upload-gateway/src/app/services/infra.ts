import { createS3Storage, S3Client, type StoragePort } from "@filegate/storage"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  s3Client: S3Client
  objectStorage: StoragePort
}

/** Accepts a bare `host[:port]` and picks the scheme from `tls`. */
export function resolveS3Endpoint(endpoint: string, tls: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint

  return `${tls ? "https" : "http"}://${endpoint}`
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  const s3Client = new S3Client({
    region: config.s3.region,
    endpoint: resolveS3Endpoint(config.s3.endpoint, config.s3.tls),
    forcePathStyle: config.s3.forcePathStyle,
    credentials: {
      accessKeyId: config.s3.accessKeyId,
      secretAccessKey: config.s3.secretAccessKey,
    },
  })

  const objectStorage = createS3Storage({ client: s3Client, clock: core.clock })

  return { s3Client, objectStorage }
}
