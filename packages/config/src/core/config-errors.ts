import { BaseError } from "@filegate/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(readonly issues: string) {
    super(`Invalid configuration:\n${issues}`, { code: "config_invalid" })
  }
}

export class ConfigSourceError extends BaseError<"config_unreadable"> {
  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Cannot read ${source}: ${reason}`, { code: "config_unreadable", cause, context: { source } })
  }
}
