import { FakeClock } from "@filegate/clock"
import type { Logger } from "@filegate/logger"
import type { MockProxy } from "vitest-mock-extended"
import { mockLogger } from "../../tests/mock-logger"
import type { LifecycleHook } from "../hooks"
import { type Closeable, stopGracefully } from "../shutdown"

describe("stopGracefully", () => {
  let clock: FakeClock
  let logger: MockProxy<Logger>
  let events: string[]

  const closesCleanly: Closeable = {
    close: (callback) => {
      events.push("close")
      callback?.()
    },
  }

  const hook = (name: string, fn?: () => void): LifecycleHook => ({
    name,
    fn: async () => {
      events.push(name)
      fn?.()
    },
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  beforeEach(() => {
    clock = new FakeClock(0)
    logger = mockLogger()
    events = []
  })

  it("closes the listener before the stop hooks", async () => {
    const result = await stopGracefully({
      server: closesCleanly,
      stopHooks: [hook("s3:destroy")],
      clock,
      logger,
      deadlineMs: 1_000,
    })

    expect(events).toEqual(["close", "s3:destroy"])
    expect(result).toEqual({ ok: true, failures: [], timedOut: false })
    expect(logger.info).toHaveBeenCalledWith("Server stopped", { failureCount: 0, timedOut: false })
  })

  it("still runs the stop hooks when close reports an error", async () => {
    const closeError = new Error("not running")
    const failsToClose: Closeable = { close: (callback) => callback?.(closeError) }

    const result = await stopGracefully({
      server: failsToClose,
      stopHooks: [hook("s3:destroy")],
      clock,
      logger,
      deadlineMs: 1_000,
    })

    expect(events).toEqual(["s3:destroy"])
    expect(result).toEqual({
      ok: false,
      failures: [{ hook: "http:close", error: closeError }],
      timedOut: false,
    })
  })

  it("is not ok when the deadline runs out", async () => {
    const result = await stopGracefully({
      server: closesCleanly,
      stopHooks: [hook("slow", () => clock.advance(1_000)), hook("skipped")],
      clock,
      logger,
      deadlineMs: 1_000,
    })

    expect(events).toEqual(["close", "slow"])
    expect(result).toEqual({ ok: false, failures: [], timedOut: true })
  })

  it("stops waiting on close once the deadline aborts it", async () => {
    vi.useFakeTimers()
    const neverCloses: Closeable = { close: () => {} }

    const pending = stopGracefully({
      server: neverCloses,
      stopHooks: [],
      clock,
      logger,
      deadlineMs: 250,
    })
    await vi.advanceTimersByTimeAsync(250)

    expect(await pending).toEqual({ ok: false, failures: [], timedOut: true })
  })
})
