import type { Readable } from "node:stream"
import type { StorageKey } from "@filegate/storage"
import type { ConditionalHeaders } from "../model/preconditions"

export type ReadMethod = "GET" | "HEAD"

export type ReadMode = "proxy" | "redirect"

export type ReadRequest = {
  method: ReadMethod
  key: StorageKey
  headers: ConditionalHeaders & { range?: string | undefined }
}

export type ReadStatus = 200 | 206 | 302 | 304 | 412 | 416

export type ReadResponse = {
  status: ReadStatus
  headers: Record<string, string>
  body?: Readable
}

/** How GET and HEAD are answered; chosen once from `proxyMode`. */
export interface ReadStrategy {
  readonly mode: ReadMode
  read(request: ReadRequest): Promise<ReadResponse>
}
