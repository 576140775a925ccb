import type { ByteRange, Bytes } from "@filegate/storage"

export type RangeRequest =
  | { kind: "full" }
  | { kind: "partial"; range: ByteRange }
  | { kind: "unsatisfiable" }

const FULL: RangeRequest = { kind: "full" }
const UNSATISFIABLE: RangeRequest = { kind: "unsatisfiable" }

/**
 * Resolves a `Range` header against an object of `size` bytes.
 *
 * Only a single `bytes=` range is honored. Multiple ranges and malformed
 * values fall back to the full body, which a server may always send.
 */
export function parseRangeHeader(header: string | undefined, size: Bytes): RangeRequest {
  if (header === undefined) return FULL

  const value = header.trim()
  if (!value.startsWith("bytes=")) return FULL

  const rangeSet = value.slice("bytes=".length).trim()
  if (rangeSet.includes(",")) return FULL

  const match = /^(\d*)\s*-\s*(\d*)$/.exec(rangeSet)
  if (!match) return FULL

  const [, rawStart = "", rawEnd = ""] = match
  if (rawStart === "" && rawEnd === "") return FULL

  if (rawStart === "") {
    const suffix = Number(rawEnd)
    if (!Number.isSafeInteger(suffix)) return FULL
    if (suffix === 0 || size === 0) return UNSATISFIABLE

    const length = Math.min(suffix, size)
    return { kind: "partial", range: { start: size - length, end: size - 1 } }
  }

  const start = Number(rawStart)
  if (!Number.isSafeInteger(start)) return FULL

  const end = rawEnd === "" ? size - 1 : Number(rawEnd)
  if (!Number.isSafeInteger(end)) return FULL
  if (rawEnd !== "" && end < start) return FULL

  if (start >= size) return UNSATISFIABLE

  return { kind: "partial", range: { start, end: Math.min(end, size - 1) } }
}

export function rangeLength(range: ByteRange): Bytes {
  return range.end - range.start + 1
}

export function formatContentRange(range: ByteRange, size: Bytes): string {
  return `bytes ${range.start}-${range.end}/${size}`
}

export function formatUnsatisfiedRange(size: Bytes): string {
  return `bytes */${size}`
}
