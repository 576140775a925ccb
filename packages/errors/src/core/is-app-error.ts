import type { AppError } from "../ports/error"

/** Structural, so an error from a duplicate copy of this package still counts. */
export function isAppError(value: unknown): value is AppError {
  if (!(value instanceof Error) || !("code" in value) || !("context" in value)) return false

  return typeof value.code === "string" && typeof value.context === "object" && value.context !== null
}
