export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock } from "./ports/clock"
export type { Milliseconds, Seconds, UnixMs } from "./ports/time"
export { MS_PER_SECOND, truncateToSecond } from "./ports/time"
