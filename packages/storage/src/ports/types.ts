import type { Readable } from "node:stream"
import type { Seconds } from "@filegate/clock"

export type Bytes = number

/** Used verbatim; adapters never normalise keys. */
export type StorageKey = string
export type StorageBucket = string

export type StorageData = Readable | Uint8Array

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

/** Inclusive on both ends, like `Range: bytes=start-end`. */
export interface ByteRange {
  start: Bytes
  end: Bytes
}

export interface StorageObjectMetadata {
  key: StorageKey
  /** Size of the whole object, also when only a range was fetched. */
  sizeInBytes: Bytes
  lastModified: Date
  etag?: string
  contentType?: string
  contentDisposition?: string
}

export interface StorageObject extends StorageObjectMetadata {
  body: Readable
  /** Set when `body` holds only this part of the object. */
  range?: ByteRange
}

export interface PutOptions {
  contentType?: string
  contentDisposition?: string
  /** Known body length. Lets the S3 adapter send one PutObject instead of a multipart upload. */
  sizeInBytes?: Bytes
}

export interface PutResult {
  etag?: string
}

export interface GetOptions {
  range?: ByteRange
}

export interface PresignedDownloadOptions {
  expiresInSeconds?: Seconds
  /** Header values the store substitutes when the URL is fetched. */
  responseContentType?: string
  responseContentDisposition?: string
}
