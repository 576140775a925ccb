import type { UnixMs } from "./time"

/** Wall-clock reads for lifecycle deadlines, `Last-Modified` and stored-object timestamps. */
export interface Clock {
  now(): Date

  /** Same instant as `now()`, as epoch milliseconds. Use it for deadline math. */
  nowMs(): UnixMs
}
