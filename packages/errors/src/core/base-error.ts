import type { AppError, ErrorCode, ErrorContext } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode> = {
  code: C
  context?: ErrorContext
  cause?: unknown
}

/**
 * Raised on purpose. Subclasses narrow `C` to their own codes and add one
 * static factory per failure.
 */
export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext

  constructor(message: string, { code, context = {}, cause }: BaseErrorOptions<C>) {
    super(message, cause === undefined ? undefined : { cause })

    this.name = new.target.name
    this.code = code
    this.context = Object.freeze({ ...context })
  }
}
