import type { Logger } from "@filegate/logger"
import type { ErrorHandler } from "hono"
import { routePath } from "hono/route"
import { type ErrorMappings, toErrorResponse } from "./error-response"

/**
 * Turns anything a route throws into the JSON error envelope. Server-side
 * failures are logged with the error attached; client errors without it.
 */
export function errorHandler(mappings: ErrorMappings, fallbackLogger: Logger): ErrorHandler {
  return (err, c) => {
    const body = toErrorResponse(mappings, err, c.get("requestId") ?? "unknown")
    const { status, code } = body.error

    const logger = c.get("logger") ?? fallbackLogger
    const fields = { route: routePath(c) || c.req.path, status, code }

    if (status >= 500) {
      logger.error("Request failed", { ...fields, err })
    } else {
      logger.info("Request rejected", fields)
    }

    return c.json(body, status)
  }
}
