import { type ErrorCode, isAppError } from "@filegate/errors"
import type { StatusCode } from "../http/status-codes"

/** Status and body message for one error code. The message goes to clients as is. */
export type ErrorMapping = {
  status: StatusCode
  message: string
}

export type ErrorMappings = Partial<Record<ErrorCode, ErrorMapping>>

export type ErrorResponse = {
  error: {
    status: StatusCode
    code: ErrorCode
    message: string
    requestId: string
  }
}

const INTERNAL_ERROR: ErrorMapping = { status: 500, message: "Internal Server Error" }

/**
 * An app error keeps its code; its status and message come from `mappings`,
 * or are a plain 500 when the code is not mapped. Anything else is `internal_error`.
 */
export function toErrorResponse(
  mappings: ErrorMappings,
  err: unknown,
  requestId: string,
): ErrorResponse {
  const code = isAppError(err) ? err.code : "internal_error"
  const { status, message } = mappings[code] ?? INTERNAL_ERROR

  return { error: { status, code, message, requestId } }
}
