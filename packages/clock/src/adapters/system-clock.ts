import type { Clock } from "../ports/clock"
import type { UnixMs } from "../ports/time"

/** Reads the host clock on every call. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): UnixMs {
    return Date.now()
  }
}
