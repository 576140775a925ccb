import type { Milliseconds } from "@filegate/clock"
import { type LogLevelName, logLevelNames } from "@filegate/logger"
import { z } from "zod/mini"

const nonEmpty = () => z.string().check(z.minLength(1))

/** Keys as they appear in the TOML file. */
export const fileSchema = z.object({
  listenport: nonEmpty(),
  secret: nonEmpty(),
  uploadSubDir: z._default(z.string(), "upload"),
  proxyMode: z._default(z.boolean(), false),

  s3Endpoint: nonEmpty(),
  s3AccessKey: nonEmpty(),
  s3Secret: nonEmpty(),
  s3TLS: z._default(z.boolean(), true),
  s3Bucket: nonEmpty(),
  s3Region: z._default(z.string(), "us-east-1"),
  s3ForcePathStyle: z._default(z.boolean(), true),

  logLevel: z._default(z.enum(logLevelNames), "info"),
  logPretty: z._default(z.boolean(), false),

  shutdownTimeoutMs: z._default(z.number(), 10_000),
})

export type FileConfig = z.infer<typeof fileSchema>

export type AppConfig = {
  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  files: {
    /** Shared HMAC secret; also held by the XMPP server's upload component. */
    secret: string

    /** Mount path without surrounding slashes, e.g. "upload". */
    uploadSubDir: string

    proxyMode: boolean
  }

  s3: {
    endpoint: string
    accessKeyId: string
    secretAccessKey: string
    tls: boolean
    bucket: string
    region: string
    forcePathStyle: boolean
  }
}
