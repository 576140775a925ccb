import { truncateToSecond, type UnixMs } from "@filegate/clock"

export type ConditionalHeaders = {
  ifMatch?: string | undefined
  ifNoneMatch?: string | undefined
  ifModifiedSince?: string | undefined
  ifUnmodifiedSince?: string | undefined
  ifRange?: string | undefined
}

export type Validators = {
  etag?: string
  lastModified: Date
}

export type PreconditionOutcome = "proceed" | "not_modified" | "precondition_failed"

type Condition = "none" | "pass" | "fail"

/**
 * RFC 9110 section 13.2.2 evaluation order for GET and HEAD:
 * If-Match, else If-Unmodified-Since; then If-None-Match, else
 * If-Modified-Since. Dates compare at second precision.
 */
export function evaluatePreconditions(
  headers: ConditionalHeaders,
  validators: Validators,
): PreconditionOutcome {
  let unchanged = checkIfMatch(headers.ifMatch, validators.etag)
  if (unchanged === "none") {
    unchanged = checkIfUnmodifiedSince(headers.ifUnmodifiedSince, validators.lastModified)
  }
  if (unchanged === "fail") return "precondition_failed"

  const changed = checkIfNoneMatch(headers.ifNoneMatch, validators.etag)
  if (changed === "fail") return "not_modified"

  if (
    changed === "none" &&
    checkIfModifiedSince(headers.ifModifiedSince, validators.lastModified) === "fail"
  ) {
    return "not_modified"
  }

  return "proceed"
}

/**
 * Whether a `Range` request still applies given `If-Range`. A validator
 * that does not match means the client wants the whole, current body.
 */
export function rangeStillApplies(ifRange: string | undefined, validators: Validators): boolean {
  if (ifRange === undefined) return true

  const value = ifRange.trim()

  if (value.startsWith('"') || value.startsWith("W/")) {
    return validators.etag !== undefined && strongMatch(value, validators.etag)
  }

  const date = parseHttpDate(value)

  return date !== undefined && secondsOf(validators.lastModified) === date
}

export function formatHttpDate(date: Date): string {
  return date.toUTCString()
}

function checkIfMatch(header: string | undefined, etag: string | undefined): Condition {
  if (header === undefined) return "none"

  const tags = splitEntityTags(header)
  if (tags.includes("*")) return "pass"

  return etag !== undefined && tags.some((tag) => strongMatch(tag, etag)) ? "pass" : "fail"
}

function checkIfUnmodifiedSince(header: string | undefined, lastModified: Date): Condition {
  const since = parseHttpDate(header)
  if (since === undefined) return "none"

  return secondsOf(lastModified) <= since ? "pass" : "fail"
}

function checkIfNoneMatch(header: string | undefined, etag: string | undefined): Condition {
  if (header === undefined) return "none"

  const tags = splitEntityTags(header)
  if (tags.includes("*")) return "fail"

  return etag !== undefined && tags.some((tag) => weakMatch(tag, etag)) ? "fail" : "pass"
}

function checkIfModifiedSince(header: string | undefined, lastModified: Date): Condition {
  const since = parseHttpDate(header)
  if (since === undefined) return "none"

  return secondsOf(lastModified) <= since ? "fail" : "pass"
}

function splitEntityTags(header: string): string[] {
  return header
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag !== "")
}

function strongMatch(a: string, b: string): boolean {
  return !a.startsWith("W/") && !b.startsWith("W/") && a === b
}

function weakMatch(a: string, b: string): boolean {
  return stripWeak(a) === stripWeak(b)
}

function stripWeak(tag: string): string {
  return tag.startsWith("W/") ? tag.slice(2) : tag
}

function parseHttpDate(value: string | undefined): UnixMs | undefined {
  if (value === undefined) return undefined

  const ms = Date.parse(value)

  return Number.isNaN(ms) ? undefined : ms
}

function secondsOf(date: Date): UnixMs {
  return truncateToSecond(date.getTime())
}
