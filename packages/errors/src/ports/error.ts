/** snake_case identifier that error bodies carry, e.g. `signature_mismatch`. */
export type ErrorCode = Lowercase<string>

/** Fields for the logs. Responses never include them. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext
}
