import { Readable } from "node:stream"
import {
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  type PutObjectCommandInput,
  type S3Client,
} from "@aws-sdk/client-s3"
import { Upload } from "@aws-sdk/lib-storage"
import { getSignedUrl } from "@aws-sdk/s3-request-presigner"
import type { Clock, Seconds } from "@filegate/clock"
import type { StoragePort } from "../ports/storage"
import type {
  ByteRange,
  Bytes,
  GetOptions,
  ObjectRef,
  PresignedDownloadOptions,
  PutOptions,
  PutResult,
  StorageBucket,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/types"

/** Longest lifetime SigV4 allows for a presigned URL. */
export const MAX_PRESIGN_SECONDS: Seconds = 604_800

export type S3StorageOptions = {
  client: S3Client
  /** Stands in for a missing Last-Modified. */
  clock: Clock
}

/** Header fields shared by HeadObject and GetObject output. */
type ObjectHeaders = {
  ContentLength?: number
  ContentRange?: string
  LastModified?: Date
  ETag?: string
  ContentType?: string
  ContentDisposition?: string
}

export class S3Storage implements StoragePort {
  private readonly client: S3Client
  private readonly clock: Clock

  constructor(options: S3StorageOptions) {
    this.client = options.client
    this.clock = options.clock
  }

  async bucketExists(bucket: StorageBucket): Promise<boolean> {
    const found = await this.unlessMissing(() =>
      this.client.send(new HeadBucketCommand({ Bucket: bucket })),
    )
    return found !== null
  }

  /**
   * A known size goes out as one PutObject streaming the body. Without it the
   * body is sent as a multipart upload, which needs no length up front.
   */
  async put(ref: ObjectRef, data: StorageData, options: PutOptions = {}): Promise<PutResult> {
    const input: PutObjectCommandInput = {
      Bucket: ref.bucket,
      Key: ref.key,
      Body: data,
      ContentType: options.contentType,
      ContentDisposition: options.contentDisposition,
    }

    const output =
      options.sizeInBytes === undefined
        ? await new Upload({ client: this.client, params: input }).done()
        : await this.client.send(
            new PutObjectCommand({ ...input, ContentLength: options.sizeInBytes }),
          )
    const etag = "ETag" in output ? output.ETag : undefined

    return etag === undefined ? {} : { etag }
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const headers = await this.unlessMissing(() =>
      this.client.send(new HeadObjectCommand({ Bucket: ref.bucket, Key: ref.key })),
    )
    return headers && this.metadata(ref, headers)
  }

  async get(ref: ObjectRef, options: GetOptions = {}): Promise<StorageObject | null> {
    const { range } = options
    const output = await this.unlessMissing(() =>
      this.client.send(
        new GetObjectCommand({
          Bucket: ref.bucket,
          Key: ref.key,
          Range: range && `bytes=${range.start}-${range.end}`,
        }),
      ),
    )
    if (!output) return null

    if (!(output.Body instanceof Readable)) {
      throw new Error(`Expected a stream body for ${ref.bucket}/${ref.key}`)
    }

    const served = parseContentRange(output.ContentRange)

    return {
      ...this.metadata(ref, output),
      ...(served && { sizeInBytes: served.size, range: served.range }),
      body: output.Body,
    }
  }

  async getPresignedDownloadUrl(
    ref: ObjectRef,
    options: PresignedDownloadOptions = {},
  ): Promise<URL> {
    const command = new GetObjectCommand({
      Bucket: ref.bucket,
      Key: ref.key,
      ResponseContentType: options.responseContentType,
      ResponseContentDisposition: options.responseContentDisposition,
    })

    const expiresIn =
      options.expiresInSeconds === undefined
        ? undefined
        : Math.min(options.expiresInSeconds, MAX_PRESIGN_SECONDS)

    return new URL(await getSignedUrl(this.client, command, { expiresIn }))
  }

  private metadata(ref: ObjectRef, headers: ObjectHeaders): StorageObjectMetadata {
    return {
      key: ref.key,
      sizeInBytes: headers.ContentLength ?? 0,
      lastModified: headers.LastModified ?? this.clock.now(),
      ...(headers.ETag !== undefined && { etag: headers.ETag }),
      ...(headers.ContentType !== undefined && { contentType: headers.ContentType }),
      ...(headers.ContentDisposition !== undefined && {
        contentDisposition: headers.ContentDisposition,
      }),
    }
  }

  /** Resolves to null when S3 answers that the bucket or key does not exist. */
  private async unlessMissing<T>(call: () => Promise<T>): Promise<T | null> {
    try {
      return await call()
    } catch (err) {
      if (isMissing(err)) return null
      throw err
    }
  }
}

export function createS3Storage(options: S3StorageOptions): StoragePort {
  return new S3Storage(options)
}

/** `bytes 0-9/100` gives the served range and the full size. */
export function parseContentRange(
  header: string | undefined,
): { range: ByteRange; size: Bytes } | undefined {
  const match = /^bytes (\d+)-(\d+)\/(\d+)$/.exec(header?.trim() ?? "")
  if (!match) return undefined

  const [, start, end, size] = match.map(Number)
  if (start === undefined || end === undefined || size === undefined) return undefined

  return { range: { start, end }, size }
}

const MISSING_NAMES = new Set(["NotFound", "NoSuchKey", "NoSuchBucket"])

function isMissing(err: unknown): boolean {
  if (err instanceof Error && MISSING_NAMES.has(err.name)) return true
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return false

  const meta = err.$metadata
  return typeof meta === "object" && meta !== null && "httpStatusCode" in meta
    ? meta.httpStatusCode === 404
    : false
}
