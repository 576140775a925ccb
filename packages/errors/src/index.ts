export { BaseError, type BaseErrorOptions } from "./core/base-error"
export { isAppError } from "./core/is-app-error"
export type { AppError, ErrorCode, ErrorContext } from "./ports/error"
