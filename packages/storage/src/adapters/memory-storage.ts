import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import type { Clock } from "@filegate/clock"
import type { StoragePort } from "../ports/storage"
import type {
  GetOptions,
  ObjectRef,
  PresignedDownloadOptions,
  PutOptions,
  PutResult,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/types"

type Entry = {
  bytes: Buffer
  etag: string
  lastModified: Date
  contentType?: string
  contentDisposition?: string
}

export type MemoryStorageOptions = {
  clock: Clock
  /** Exist from the start; others appear on their first write. */
  buckets?: StorageBucket[]
}

/**
 * Keeps objects in a map. ETags are quoted MD5 hex digests like S3's for
 * single-part uploads, and presigned URLs look like
 * `memory://bucket/key?response-content-type=...`.
 */
export class MemoryStorage implements StoragePort {
  private readonly clock: Clock
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, Entry>>()

  constructor(options: MemoryStorageOptions) {
    this.clock = options.clock
    for (const name of options.buckets ?? []) this.bucket(name)
  }

  async bucketExists(bucket: StorageBucket): Promise<boolean> {
    return this.buckets.has(bucket)
  }

  async put(ref: ObjectRef, data: StorageData, options: PutOptions = {}): Promise<PutResult> {
    const bytes = await collect(data)

    if (options.sizeInBytes !== undefined && options.sizeInBytes !== bytes.length) {
      throw new Error(`Expected ${options.sizeInBytes} bytes for ${ref.key}, got ${bytes.length}`)
    }

    const entry: Entry = {
      bytes,
      etag: `"${createHash("md5").update(bytes).digest("hex")}"`,
      lastModified: this.clock.now(),
      ...(options.contentType !== undefined && { contentType: options.contentType }),
      ...(options.contentDisposition !== undefined && {
        contentDisposition: options.contentDisposition,
      }),
    }
    this.bucket(ref.bucket).set(ref.key, entry)

    return { etag: entry.etag }
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const entry = this.buckets.get(ref.bucket)?.get(ref.key)
    return entry ? metadataOf(ref.key, entry) : null
  }

  async get(ref: ObjectRef, options: GetOptions = {}): Promise<StorageObject | null> {
    const entry = this.buckets.get(ref.bucket)?.get(ref.key)
    if (!entry) return null

    if (!options.range) return { ...metadataOf(ref.key, entry), body: Readable.from([entry.bytes]) }

    const start = options.range.start
    const end = Math.min(options.range.end, entry.bytes.length - 1)

    return {
      ...metadataOf(ref.key, entry),
      range: { start, end },
      body: Readable.from([entry.bytes.subarray(start, end + 1)]),
    }
  }

  async getPresignedDownloadUrl(
    ref: ObjectRef,
    options: PresignedDownloadOptions = {},
  ): Promise<URL> {
    const url = new URL(`memory://${ref.bucket}/${encodeURI(ref.key)}`)
    const params: [string, string | number | undefined][] = [
      ["expires", options.expiresInSeconds],
      ["response-content-type", options.responseContentType],
      ["response-content-disposition", options.responseContentDisposition],
    ]

    for (const [name, value] of params) {
      if (value !== undefined) url.searchParams.set(name, String(value))
    }

    return url
  }

  private bucket(name: StorageBucket): Map<StorageKey, Entry> {
    const existing = this.buckets.get(name)
    if (existing) return existing

    const created = new Map<StorageKey, Entry>()
    this.buckets.set(name, created)
    return created
  }
}

export function createMemoryStorage(options: MemoryStorageOptions): StoragePort {
  return new MemoryStorage(options)
}

function metadataOf(key: StorageKey, entry: Entry): StorageObjectMetadata {
  return {
    key,
    sizeInBytes: entry.bytes.length,
    lastModified: entry.lastModified,
    etag: entry.etag,
    ...(entry.contentType !== undefined && { contentType: entry.contentType }),
    ...(entry.contentDisposition !== undefined && { contentDisposition: entry.contentDisposition }),
  }
}

async function collect(data: StorageData): Promise<Buffer> {
  if (data instanceof Uint8Array) return Buffer.from(data)

  const chunks: Buffer[] = []
  for await (const chunk of data) chunks.push(Buffer.from(chunk))
  return Buffer.concat(chunks)
}
