import type { Seconds } from "@filegate/clock"
import type { FileStore } from "../infra/file-store"
import { contentMetadataFor } from "../model/content-metadata"
import type { ReadRequest, ReadResponse, ReadStrategy } from "./read-strategy"

export const REDIRECT_URL_TTL_SECONDS: Seconds = 24 * 60 * 60

export type RedirectReadStrategyDeps = {
  fileStore: FileStore
}

/**
 * Sends the client to a presigned object-store URL. Signing happens offline,
 * so a missing object is only noticed by the object store.
 */
export class RedirectReadStrategy implements ReadStrategy {
  readonly mode = "redirect"

  constructor(
    private readonly deps: RedirectReadStrategyDeps,
    private readonly ttlSeconds: Seconds = REDIRECT_URL_TTL_SECONDS,
  ) {}

  async read(request: ReadRequest): Promise<ReadResponse> {
    const { contentType, disposition } = contentMetadataFor(request.key)

    const url = await this.deps.fileStore.presign(request.key, this.ttlSeconds, {
      responseContentType: contentType,
      responseContentDisposition: disposition,
    })

    return { status: 302, headers: { Location: url.toString() } }
  }
}
