/** Milliseconds since an arbitrary origin, or a duration in milliseconds. */
export type Milliseconds = number

/** Whole seconds, as used by HTTP dates and presigned URL lifetimes. */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = Milliseconds

export const MS_PER_SECOND: Milliseconds = 1000

/** Drops the sub-second part of an epoch timestamp. */
export function truncateToSecond(ms: UnixMs): UnixMs {
  return Math.floor(ms / MS_PER_SECOND) * MS_PER_SECOND
}
