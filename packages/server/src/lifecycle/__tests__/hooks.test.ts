import { FakeClock } from "@filegate/clock"
import type { Logger } from "@filegate/logger"
import type { MockProxy } from "vitest-mock-extended"
import { mockLogger } from "../../tests/mock-logger"
import { type HookRun, type LifecycleHook, runHooks } from "../hooks"

describe("runHooks", () => {
  let clock: FakeClock
  let logger: MockProxy<Logger>
  let order: string[]

  const run = (overrides: Partial<HookRun> = {}): HookRun => ({
    phase: "shutdown",
    clock,
    logger,
    deadlineMs: 500,
    stopOnFailure: false,
    ...overrides,
  })

  const record = (name: string): LifecycleHook => ({
    name,
    fn: async () => {
      order.push(name)
    },
  })

  const failing = (name: string, error: unknown): LifecycleHook => ({
    name,
    fn: async () => {
      order.push(name)
      throw error
    },
  })

  beforeEach(() => {
    clock = new FakeClock(0)
    logger = mockLogger()
    order = []
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("runs every hook in order", async () => {
    const result = await runHooks([record("close"), record("s3")], run())

    expect(order).toEqual(["close", "s3"])
    expect(result).toEqual({ failures: [], timedOut: false })
    expect(logger.info).toHaveBeenCalledWith("Hook done", { phase: "shutdown", hook: "s3" })
  })

  it("hands each hook what is left of the shared deadline", async () => {
    const budgets: number[] = []
    const spend = (ms: number): LifecycleHook => ({
      name: `spend-${ms}`,
      fn: async ({ timeRemainingMs }) => {
        budgets.push(timeRemainingMs)
        clock.advance(ms)
      },
    })

    await runHooks([spend(120), spend(80), spend(0)], run())

    expect(budgets).toEqual([500, 380, 300])
  })

  it("keeps going after a failure by default", async () => {
    const error = new Error("bucket gone")

    const result = await runHooks([failing("check", error), record("after")], run())

    expect(order).toEqual(["check", "after"])
    expect(result).toEqual({ failures: [{ hook: "check", error }], timedOut: false })
    expect(logger.error).toHaveBeenCalledWith("Hook failed", {
      phase: "shutdown",
      hook: "check",
      err: error,
    })
  })

  it("gives up on the first failure with stopOnFailure", async () => {
    const error = new Error("bucket gone")

    const result = await runHooks(
      [failing("check", error), record("after")],
      run({ phase: "startup", stopOnFailure: true }),
    )

    expect(order).toEqual(["check"])
    expect(result).toEqual({ failures: [{ hook: "check", error }], timedOut: false })
  })

  it("reports a thrown undefined as a failure", async () => {
    const result = await runHooks([failing("odd", undefined)], run())

    expect(result.failures).toEqual([{ hook: "odd", error: undefined }])
  })

  it("stops after a hook that overran the deadline", async () => {
    const overrun: LifecycleHook = { name: "slow", fn: async () => void clock.advance(500) }

    const result = await runHooks([overrun, record("never")], run())

    expect(order).toEqual([])
    expect(result).toEqual({ failures: [], timedOut: true })
    expect(logger.warn).toHaveBeenCalledWith("Hook overran the deadline", {
      phase: "shutdown",
      hook: "slow",
    })
  })

  it("starts nothing once the deadline has passed", async () => {
    clock.set(501)

    const result = await runHooks([record("late")], run())

    expect(order).toEqual([])
    expect(result).toEqual({ failures: [], timedOut: true })
    expect(logger.warn).toHaveBeenCalledWith("Hook skipped, deadline passed", {
      phase: "shutdown",
      hook: "late",
    })
  })

  it("aborts the hook's signal at the deadline", async () => {
    vi.useFakeTimers()
    let aborted = false
    const waiting: LifecycleHook = {
      name: "waits",
      fn: ({ signal }) =>
        new Promise((resolve) => {
          signal.addEventListener("abort", () => {
            aborted = true
            resolve()
          })
        }),
    }

    const pending = runHooks([waiting], run())
    await vi.advanceTimersByTimeAsync(500)
    const result = await pending

    expect(aborted).toBe(true)
    expect(result.timedOut).toBe(true)
  })
})
