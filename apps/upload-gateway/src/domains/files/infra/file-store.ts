import type { Seconds } from "@filegate/clock"
import type {
  GetOptions,
  ObjectRef,
  PutResult,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
  StoragePort,
} from "@filegate/storage"
import { FileGatewayError } from "../model/files.errors"

export type FileStoreOptions = {
  bucket: StorageBucket
}

export type FileStoreDeps = {
  objectStorage: StoragePort
}

export type PutFileOptions = {
  contentType: string
  contentDisposition: string

  /** Declared body length; negative when the client did not send one. */
  sizeInBytes: number
}

export type PresignOverrides = {
  responseContentType: string
  responseContentDisposition: string
}

/**
 * The gateway's single bucket. Failures surface as `FileGatewayError`:
 * `backend_error` for writes, `storage_error` for everything read-side.
 */
export class FileStore {
  public constructor(
    private readonly deps: FileStoreDeps,
    private readonly opts: FileStoreOptions,
  ) {}

  get bucket(): StorageBucket {
    return this.opts.bucket
  }

  /** Throws the backend's own error when the bucket cannot be queried. */
  async exists(): Promise<boolean> {
    return this.deps.objectStorage.bucketExists(this.opts.bucket)
  }

  async put(key: StorageKey, body: StorageData, options: PutFileOptions): Promise<PutResult> {
    try {
      return await this.deps.objectStorage.put(this.ref(key), body, {
        contentType: options.contentType,
        contentDisposition: options.contentDisposition,
        ...(options.sizeInBytes >= 0 && { sizeInBytes: options.sizeInBytes }),
      })
    } catch (err) {
      throw FileGatewayError.backendError(key, err)
    }
  }

  async head(key: StorageKey): Promise<StorageObjectMetadata | null> {
    try {
      return await this.deps.objectStorage.head(this.ref(key))
    } catch (err) {
      throw FileGatewayError.storageError(key, err)
    }
  }

  async get(key: StorageKey, options: GetOptions = {}): Promise<StorageObject | null> {
    try {
      return await this.deps.objectStorage.get(this.ref(key), options)
    } catch (err) {
      throw FileGatewayError.storageError(key, err)
    }
  }

  async presign(
    key: StorageKey,
    expiresInSeconds: Seconds,
    overrides: PresignOverrides,
  ): Promise<URL> {
    try {
      return await this.deps.objectStorage.getPresignedDownloadUrl(this.ref(key), {
        expiresInSeconds,
        ...overrides,
      })
    } catch (err) {
      throw FileGatewayError.storageError(key, err)
    }
  }

  private ref(key: StorageKey): ObjectRef {
    return { bucket: this.opts.bucket, key }
  }
}
