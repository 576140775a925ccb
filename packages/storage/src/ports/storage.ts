import type {
  GetOptions,
  ObjectRef,
  PresignedDownloadOptions,
  PutOptions,
  PutResult,
  StorageBucket,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "./types"

/** An S3-like object store. Missing objects read as `null`; every other failure throws. */
export interface StoragePort {
  /** `false` only when the store says the bucket is not there. */
  bucketExists(bucket: StorageBucket): Promise<boolean>

  /** Replaces whatever is stored under the key. */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<PutResult>

  head(ref: ObjectRef): Promise<StorageObjectMetadata | null>

  get(ref: ObjectRef, options?: GetOptions): Promise<StorageObject | null>

  /** Signs a GET for the object without checking that it exists. */
  getPresignedDownloadUrl(ref: ObjectRef, options?: PresignedDownloadOptions): Promise<URL>
}
