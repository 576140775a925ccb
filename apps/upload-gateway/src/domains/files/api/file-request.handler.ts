import { Readable } from "node:stream"
import type { Logger } from "@filegate/logger"
import type { Context, RequestHandler } from "@filegate/server"
import type { FileServices } from "../composition"
import { parseContentLength } from "../model/content-length"
import { contentMetadataFor } from "../model/content-metadata"
import { FileGatewayError } from "../model/files.errors"
import { parseQueryString } from "../model/query-string"
import { storageKeyFromPath } from "../model/storage-key"
import { signUpload, verifyUploadSignature } from "../model/upload-signature"
import type { ReadMethod, ReadResponse } from "../services/read-strategy"

export const ALLOWED_METHODS = "OPTIONS, HEAD, GET, PUT"

export type FileRequestHandlerOptions = {
  secret: string
  uploadSubDir: string
}

/**
 * Single entry point for everything under the upload mount: signed PUTs,
 * GET/HEAD through the configured read strategy, and OPTIONS.
 */
export function fileRequestHandler(
  files: FileServices,
  opts: FileRequestHandlerOptions,
): RequestHandler {
  return async (c: Context) => {
    const logger = c.get("logger") ?? files.logger
    const method = c.req.method

    logger.info("Incoming request", { method, url: c.req.url })

    const query = readQuery(c, logger)
    const key = storageKeyFromPath(c.req.path, opts.uploadSubDir)

    switch (method) {
      case "PUT":
        return handleUpload(c, files, opts.secret, key, query, logger)
      case "GET":
      case "HEAD":
        return handleRead(c, files, method, key)
      case "OPTIONS":
        return c.body(null, 200, { Allow: ALLOWED_METHODS })
      default:
        throw FileGatewayError.methodNotAllowed(method)
    }
  }
}

async function handleUpload(
  c: Context,
  files: FileServices,
  secret: string,
  key: string,
  query: URLSearchParams,
  logger: Logger,
): Promise<Response> {
  const provided = query.get("v")
  if (provided === null) throw FileGatewayError.signatureMissing(key)

  const contentLength = parseContentLength(c.req.header("content-length"))

  logger.info("Upload requested", { storageKey: key, contentLength })

  if (!verifyUploadSignature(secret, key, contentLength, provided)) {
    logger.warn("Invalid upload signature", {
      storageKey: key,
      contentLength,
      expected: signUpload(secret, key, contentLength),
    })

    throw FileGatewayError.signatureMismatch(key, contentLength)
  }

  const { contentType, disposition } = contentMetadataFor(key)
  const raw = c.req.raw.body
  const body = raw ? Readable.fromWeb(raw) : Buffer.alloc(0)

  const stored = await files.fileStore.put(key, body, {
    contentType,
    contentDisposition: disposition,
    sizeInBytes: contentLength,
  })

  logger.info("Stored file", { storageKey: key, etag: stored.etag })

  return c.body(null, 201)
}

async function handleRead(
  c: Context,
  files: FileServices,
  method: ReadMethod,
  key: string,
): Promise<Response> {
  const result = await files.readStrategy.read({
    method,
    key,
    headers: {
      ifMatch: c.req.header("if-match"),
      ifNoneMatch: c.req.header("if-none-match"),
      ifModifiedSince: c.req.header("if-modified-since"),
      ifUnmodifiedSince: c.req.header("if-unmodified-since"),
      ifRange: c.req.header("if-range"),
      range: c.req.header("range"),
    },
  })

  return toResponse(result)
}

function toResponse(result: ReadResponse): Response {
  const body = result.body ? Readable.toWeb(result.body) : null

  return new Response(body, { status: result.status, headers: result.headers })
}

function readQuery(c: Context, logger: Logger): URLSearchParams {
  const search = new URL(c.req.url).search
  const query = parseQueryString(search)

  if (query) return query

  logger.warn("Malformed query string, ignoring it", { url: c.req.url })

  return new URLSearchParams()
}
