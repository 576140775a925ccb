import type { Milliseconds } from "@filegate/clock"
import type { Logger } from "@filegate/logger"
import type { Application } from "../server/application"

export interface ReadinessCheck {
  name: string
  /** Resolves `false`, or rejects, while the dependency is unusable. */
  fn: (signal: AbortSignal) => Promise<boolean>
}

export type HealthRoutesOptions = {
  checks: ReadinessCheck[]
  timeoutMs: Milliseconds
  isReady: () => boolean
  logger: Logger
}

type Verdict = { ok: true } | { ok: false; reason: string }

const NO_STORE = { "Cache-Control": "no-store" }

/**
 * `GET /health` answers while the process serves HTTP. `GET /ready` answers
 * 503 until startup finished and whenever a readiness check fails; the body
 * names the check.
 */
export function registerHealthRoutes(app: Application, options: HealthRoutesOptions): void {
  app.get("/health", (c) => c.json({ ok: true }, 200, NO_STORE))

  app.get("/ready", async (c) => {
    const verdict: Verdict = options.isReady()
      ? await runChecks(options)
      : { ok: false, reason: "starting" }

    return verdict.ok
      ? c.json({ ok: true }, 200, NO_STORE)
      : c.json({ ok: false, reason: verdict.reason }, 503, NO_STORE)
  })
}

async function runChecks({ checks, timeoutMs, logger }: HealthRoutesOptions): Promise<Verdict> {
  for (const check of checks) {
    const verdict = await runCheck(check, timeoutMs, logger)
    if (!verdict.ok) return verdict
  }

  return { ok: true }
}

async function runCheck(
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
  logger: Logger,
): Promise<Verdict> {
  const signal = AbortSignal.timeout(timeoutMs)
  const abandoned = new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true })
  })

  try {
    const passed = await Promise.race([check.fn(signal), abandoned])
    return passed ? { ok: true } : { ok: false, reason: check.name }
  } catch (err) {
    const reason = signal.aborted ? `${check.name}:timeout` : `${check.name}:error`
    logger.warn("Readiness check failed", { check: check.name, reason, err })

    return { ok: false, reason }
  }
}
