import type { Clock } from "@filegate/clock"
import type { StorageObjectMetadata } from "@filegate/storage"
import type { FileStore } from "../infra/file-store"
import {
  formatContentRange,
  formatUnsatisfiedRange,
  parseRangeHeader,
  type RangeRequest,
  rangeLength,
} from "../model/byte-range"
import { contentMetadataFor } from "../model/content-metadata"
import { FileGatewayError } from "../model/files.errors"
import {
  evaluatePreconditions,
  formatHttpDate,
  rangeStillApplies,
  type Validators,
} from "../model/preconditions"
import type { ReadRequest, ReadResponse, ReadStrategy } from "./read-strategy"

export type ProxyReadStrategyDeps = {
  fileStore: FileStore
  clock: Clock
}

/**
 * Streams objects through the gateway.
 *
 * Objects carry no usable modification time here, so `Last-Modified` is the
 * time of the request. HEAD never opens the object body.
 */
export class ProxyReadStrategy implements ReadStrategy {
  readonly mode = "proxy"

  constructor(private readonly deps: ProxyReadStrategyDeps) {}

  async read(request: ReadRequest): Promise<ReadResponse> {
    const { key } = request

    const stat = await this.deps.fileStore.head(key)
    if (!stat) throw FileGatewayError.missingObject(key)

    const now = this.deps.clock.now()
    const validators: Validators = {
      lastModified: now,
      ...(stat.etag !== undefined && { etag: stat.etag }),
    }

    const lastModified = formatHttpDate(now)
    const headers = representationHeaders(key, stat, lastModified)

    const outcome = evaluatePreconditions(request.headers, validators)

    if (outcome === "precondition_failed") return { status: 412, headers: {} }

    if (outcome === "not_modified") {
      const notModified: Record<string, string> = { "Last-Modified": lastModified }
      if (stat.etag !== undefined) notModified.ETag = stat.etag

      return { status: 304, headers: notModified }
    }

    if (request.method === "HEAD") {
      return {
        status: 200,
        headers: { ...headers, "Content-Length": String(stat.sizeInBytes) },
      }
    }

    let range: RangeRequest = parseRangeHeader(request.headers.range, stat.sizeInBytes)

    if (range.kind !== "full" && !rangeStillApplies(request.headers.ifRange, validators)) {
      range = { kind: "full" }
    }

    if (range.kind === "unsatisfiable") {
      return {
        status: 416,
        headers: { "Content-Range": formatUnsatisfiedRange(stat.sizeInBytes) },
      }
    }

    const object = await this.deps.fileStore.get(
      key,
      range.kind === "partial" ? { range: range.range } : {},
    )

    // Deleted between head and get.
    if (!object) throw FileGatewayError.missingObject(key)

    if (range.kind === "partial") {
      const served = object.range ?? range.range

      return {
        status: 206,
        headers: {
          ...headers,
          "Content-Length": String(rangeLength(served)),
          "Content-Range": formatContentRange(served, object.sizeInBytes),
        },
        body: object.body,
      }
    }

    return {
      status: 200,
      headers: { ...headers, "Content-Length": String(object.sizeInBytes) },
      body: object.body,
    }
  }
}

function representationHeaders(
  key: string,
  stat: StorageObjectMetadata,
  lastModified: string,
): Record<string, string> {
  const { contentType, disposition } = contentMetadataFor(key)

  const headers: Record<string, string> = {
    "Content-Type": contentType,
    "Content-Disposition": disposition,
    "Last-Modified": lastModified,
    "Accept-Ranges": "bytes",
  }

  if (stat.etag !== undefined) headers.ETag = stat.etag

  return headers
}
