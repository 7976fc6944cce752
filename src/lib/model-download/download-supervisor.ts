/**
 * Download Supervisor
 *
 * Runs one model pull at a time as a supervised background task:
 * - rate limits new attempts (fixed cooldown)
 * - skips the pull when the daemon already has the model
 * - feeds output lines, in order, through the parser into the tracker
 * - flags stalls, enforces a hard timeout and finalizes on exit
 *
 * Every path out of a task ends in a tracker transition.
 */

import type { ModelDaemon } from "@/lib/llm/ollama-client"
import type { HealthCache } from "./health-cache"
import { parseDownloadLine } from "./line-parser"
import type { ProgressTracker } from "./progress-tracker"
import type { PullHandle, PullRunner } from "./pull-runner"
import type { Clock, StartResult } from "./types"

export interface DownloadSupervisorOptions {
  /** Minimum spacing between download attempts */
  cooldownMs?: number
  /** No tracked change for this long marks the pull as stalled */
  stallTimeoutMs?: number
  stallCheckIntervalMs?: number
  /** The pull process is killed after this long */
  hardTimeoutMs?: number
  /** Wait before re-checking the daemon's model list after completion */
  verifyDelayMs?: number
  now?: Clock
}

export interface DownloadSupervisorDeps {
  tracker: ProgressTracker
  daemon: ModelDaemon
  runner: PullRunner
  healthCache?: Pick<HealthCache<unknown>, "invalidate">
}

type PullOutcome =
  | { kind: "completed" }
  | { kind: "failed"; message: string }
  | { kind: "timeout" }

const DEFAULTS = {
  cooldownMs: 5_000,
  stallTimeoutMs: 60_000,
  stallCheckIntervalMs: 5_000,
  hardTimeoutMs: 5 * 60_000,
  verifyDelayMs: 3_000,
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class DownloadSupervisor {
  private readonly tracker: ProgressTracker
  private readonly daemon: ModelDaemon
  private readonly runner: PullRunner
  private readonly healthCache?: Pick<HealthCache<unknown>, "invalidate">
  private readonly options: Required<Omit<DownloadSupervisorOptions, "now">>
  private readonly now: Clock

  private starting = false
  private activeHandle: PullHandle | null = null
  private tasks = new Set<Promise<void>>()

  constructor(deps: DownloadSupervisorDeps, options: DownloadSupervisorOptions = {}) {
    this.tracker = deps.tracker
    this.daemon = deps.daemon
    this.runner = deps.runner
    this.healthCache = deps.healthCache
    this.now = options.now ?? Date.now
    this.options = {
      cooldownMs: options.cooldownMs ?? DEFAULTS.cooldownMs,
      stallTimeoutMs: options.stallTimeoutMs ?? DEFAULTS.stallTimeoutMs,
      stallCheckIntervalMs: options.stallCheckIntervalMs ?? DEFAULTS.stallCheckIntervalMs,
      hardTimeoutMs: options.hardTimeoutMs ?? DEFAULTS.hardTimeoutMs,
      verifyDelayMs: options.verifyDelayMs ?? DEFAULTS.verifyDelayMs,
    }
  }

  // A healed or cleared tracker does not end the pull process
  get isRunning(): boolean {
    return this.starting || this.tracker.isDownloading || this.activeHandle !== null
  }

  /**
   * Request a download. Never queues: a second request while one is active
   * is answered with already_running.
   */
  async start(modelId: string): Promise<StartResult> {
    const model = modelId.trim()

    const lastAttempt = this.tracker.lastDownloadAttemptTime
    if (lastAttempt !== null) {
      const elapsed = this.now() - lastAttempt
      if (elapsed < this.options.cooldownMs) {
        return {
          status: "rate_limited",
          model,
          retryAfterSeconds: Math.ceil((this.options.cooldownMs - elapsed) / 1000),
        }
      }
    }

    if (this.isRunning) {
      return { status: "already_running", model: this.tracker.model || model }
    }

    this.starting = true
    try {
      this.tracker.recordDownloadAttempt()

      if (!(await this.daemon.isReachable())) {
        console.warn(`[DownloadSupervisor] Daemon unreachable, not starting download of ${model}`)
        return { status: "daemon_unavailable", model }
      }

      if (await this.daemon.isModelAvailable(model)) {
        console.log(`[DownloadSupervisor] ${model} is already available`)
        this.tracker.reset(model)
        this.tracker.markReady()
        this.healthCache?.invalidate()
        return { status: "already_available", model }
      }

      this.tracker.reset(model)
      this.healthCache?.invalidate()
      this.track(this.run(model))
      console.log(`[DownloadSupervisor] Started download of ${model} via ${this.runner.kind}`)
      return { status: "started", model }
    } finally {
      this.starting = false
    }
  }

  /**
   * Resolves once every running task has finished
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(Array.from(this.tasks))
    }
  }

  /**
   * Join running work, or kill the pull if it outlives the timeout
   */
  async shutdown(timeoutMs = 5_000): Promise<void> {
    if (this.tasks.size === 0) return

    let timer: ReturnType<typeof setTimeout> | undefined
    const joined = await Promise.race([
      this.whenIdle().then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs)
      }),
    ])
    clearTimeout(timer)

    if (!joined) {
      console.warn("[DownloadSupervisor] Shutdown timeout reached, killing pull process")
      this.activeHandle?.kill()
      this.finishWithError("Download interrupted by shutdown")
    }
  }

  private track(task: Promise<void>): void {
    this.tasks.add(task)
    task.finally(() => this.tasks.delete(task)).catch((error) => {
      console.error("[DownloadSupervisor] Task bookkeeping failed:", error)
    })
  }

  private async run(model: string): Promise<void> {
    let stallTimer: ReturnType<typeof setInterval> | undefined
    let hardTimer: ReturnType<typeof setTimeout> | undefined
    let handle: PullHandle | null = null

    try {
      handle = this.runner.start(model)
      this.activeHandle = handle

      stallTimer = setInterval(() => this.checkStall(), this.options.stallCheckIntervalMs)

      const outcome = await Promise.race([
        this.consume(handle).catch((error): PullOutcome => ({
          kind: "failed",
          message: `Failed to read download output: ${error instanceof Error ? error.message : String(error)}`,
        })),
        new Promise<PullOutcome>((resolve) => {
          hardTimer = setTimeout(() => resolve({ kind: "timeout" }), this.options.hardTimeoutMs)
        }),
      ])

      clearInterval(stallTimer)
      clearTimeout(hardTimer)
      this.activeHandle = null

      if (outcome.kind === "timeout") {
        handle.kill()
        const seconds = Math.round(this.options.hardTimeoutMs / 1000)
        console.error(`[DownloadSupervisor] Download of ${model} timed out after ${seconds}s, process killed`)
        this.finishWithError(`Download timed out after ${seconds} seconds`)
        return
      }

      if (outcome.kind === "failed") {
        console.error(`[DownloadSupervisor] Download of ${model} failed: ${outcome.message}`)
        this.finishWithError(outcome.message)
        return
      }

      this.tracker.markCompleted()
      this.healthCache?.invalidate()
      console.log(`[DownloadSupervisor] Download of ${model} completed`)

      await this.verifyAvailability(model)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error(`[DownloadSupervisor] Download of ${model} crashed:`, error)
      this.finishWithError(`Download failed: ${message}`)
    } finally {
      clearInterval(stallTimer)
      clearTimeout(hardTimer)
      if (this.activeHandle === handle) {
        this.activeHandle = null
      }
    }
  }

  private async consume(handle: PullHandle): Promise<PullOutcome> {
    let sawSuccess = false
    let errorLine: string | null = null

    for await (const line of handle.lines) {
      // Output of a pull that is no longer the current one is drained, not applied
      if (handle !== this.activeHandle) continue

      const update = parseDownloadLine(line, this.tracker.parseContext())
      this.tracker.applyUpdate(update)

      if (update.kind === "milestone" && update.terminal) {
        sawSuccess = true
      } else if (update.kind === "error") {
        errorLine = update.message
      }
    }

    const exit = await handle.exit

    if (exit.code === null && exit.error) {
      return { kind: "failed", message: exit.error }
    }
    if (sawSuccess) {
      return { kind: "completed" }
    }
    if (errorLine) {
      return { kind: "failed", message: errorLine }
    }
    if (exit.code === 0) {
      return { kind: "completed" }
    }

    const reason = exit.error ?? (exit.code === null ? `killed by ${exit.signal ?? "signal"}` : `exit code ${exit.code}`)
    return { kind: "failed", message: `Download process failed: ${reason}` }
  }

  // A reset may already have cleared the tracker
  private finishWithError(message: string): void {
    if (this.tracker.isDownloading) {
      this.tracker.markError(message)
      this.healthCache?.invalidate()
    }
  }

  private checkStall(): void {
    const idleMs = this.tracker.msSinceLastChange()
    if (idleMs !== null && idleMs >= this.options.stallTimeoutMs) {
      this.tracker.markStalled()
    }
  }

  // Advisory: the daemon may list a fresh model a little late
  private async verifyAvailability(model: string): Promise<void> {
    await delay(this.options.verifyDelayMs)
    try {
      if (await this.daemon.isModelAvailable(model)) {
        console.log(`[DownloadSupervisor] Verified ${model} is available`)
      } else {
        console.warn(`[DownloadSupervisor] ${model} not yet listed by the daemon after download`)
      }
    } catch (error) {
      console.warn(`[DownloadSupervisor] Could not verify ${model}:`, error)
    }
  }
}
