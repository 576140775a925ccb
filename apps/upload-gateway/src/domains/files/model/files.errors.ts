import { BaseError } from "@filegate/errors"

export type FileErrorCode =
  | "signature_missing"
  | "signature_mismatch"
  | "method_not_allowed"
  | "backend_error"
  | "storage_error"

export class FileGatewayError extends BaseError<FileErrorCode> {
  static signatureMissing(key: string): FileGatewayError {
    return new FileGatewayError("Upload URL carries no signature", {
      code: "signature_missing",
      context: { key },
    })
  }

  static signatureMismatch(key: string, contentLength: number): FileGatewayError {
    return new FileGatewayError("Upload signature does not match", {
      code: "signature_mismatch",
      context: { key, contentLength },
    })
  }

  static methodNotAllowed(method: string): FileGatewayError {
    return new FileGatewayError(`Method ${method} is not allowed`, {
      code: "method_not_allowed",
      context: { method },
    })
  }

  /** Writing to the object store failed. */
  static backendError(key: string, cause: unknown): FileGatewayError {
    return new FileGatewayError(`Uploading ${key} failed`, {
      code: "backend_error",
      context: { key },
      cause,
    })
  }

  /** Reading from or signing against the object store failed. */
  static storageError(key: string, cause: unknown): FileGatewayError {
    return new FileGatewayError(`Storage request for ${key} failed`, {
      code: "storage_error",
      context: { key },
      cause,
    })
  }

  /** The object store has nothing under the key. Reported like any other read failure. */
  static missingObject(key: string): FileGatewayError {
    return new FileGatewayError(`No object stored under ${key}`, {
      code: "storage_error",
      context: { key, missing: true },
    })
  }
}
