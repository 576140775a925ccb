import type { Clock, Milliseconds, UnixMs } from "@filegate/clock"
import type { Logger } from "@filegate/logger"

export interface LifecycleHookContext {
  /** Aborts when the phase deadline passes. */
  signal: AbortSignal
  timeRemainingMs: Milliseconds
}

export interface LifecycleHook {
  name: string
  fn: (ctx: LifecycleHookContext) => Promise<void>
}

export type HookFailure = {
  hook: string
  error: unknown
}

export type HookRun = {
  phase: "startup" | "shutdown"
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  /** Give up on the first failure instead of running the rest. */
  stopOnFailure: boolean
}

export type HookRunResult = {
  failures: HookFailure[]
  timedOut: boolean
}

type Outcome = { overran: boolean } & ({ failed: false } | { failed: true; error: unknown })

/**
 * Runs `hooks` in order against one deadline shared by the whole phase.
 * Hooks left when the deadline passes are not started.
 */
export async function runHooks(hooks: LifecycleHook[], run: HookRun): Promise<HookRunResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const fields = { phase: run.phase, hook: hook.name }
    const budgetMs = run.deadlineMs - run.clock.nowMs()

    if (budgetMs <= 0) {
      run.logger.warn("Hook skipped, deadline passed", fields)
      return { failures, timedOut: true }
    }

    const outcome = await runWithin(hook, budgetMs, run)

    if (outcome.failed) {
      run.logger.error("Hook failed", { ...fields, err: outcome.error })
      failures.push({ hook: hook.name, error: outcome.error })

      if (run.stopOnFailure) return { failures, timedOut: outcome.overran }
    } else if (outcome.overran) {
      run.logger.warn("Hook overran the deadline", fields)
    } else {
      run.logger.info("Hook done", fields)
    }

    if (outcome.overran) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runWithin(hook: LifecycleHook, budgetMs: Milliseconds, run: HookRun): Promise<Outcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), budgetMs)
  const overran = () => controller.signal.aborted || run.clock.nowMs() >= run.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: budgetMs })
    return { failed: false, overran: overran() }
  } catch (error) {
    return { failed: true, error, overran: overran() }
  } finally {
    clearTimeout(timer)
  }
}
