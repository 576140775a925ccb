import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** A clock that only moves when a test moves it. */
export class FakeClock implements Clock {
  private current: UnixMs

  constructor(start: UnixMs | Date = 0) {
    this.current = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.current)
  }

  nowMs(): UnixMs {
    return this.current
  }

  advance(by: Milliseconds): void {
    this.current += by
  }

  set(to: UnixMs | Date): void {
    this.current = typeof to === "number" ? to : to.getTime()
  }
}
