import { runClockContract } from "../../ports/__tests__/clock.contract"
import { SystemClock } from "../system-clock"

runClockContract({ name: "SystemClock", create: () => new SystemClock() })

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("follows the host clock", () => {
    vi.useFakeTimers({ now: new Date("2024-05-01T10:00:00.000Z") })
    const clock = new SystemClock()

    vi.advanceTimersByTime(1_500)

    expect(clock.now().toISOString()).toBe("2024-05-01T10:00:01.500Z")
    expect(clock.nowMs()).toBe(Date.UTC(2024, 4, 1, 10, 0, 1, 500))
  })
})
