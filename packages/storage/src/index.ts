export { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3"
export {
  createMemoryStorage,
  MemoryStorage,
  type MemoryStorageOptions,
} from "./adapters/memory-storage"
export {
  createS3Storage,
  MAX_PRESIGN_SECONDS,
  parseContentRange,
  S3Storage,
  type S3StorageOptions,
} from "./adapters/s3-storage"
export type { StoragePort } from "./ports/storage"
export type {
  ByteRange,
  Bytes,
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
} from "./ports/types"
