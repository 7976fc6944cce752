/**
 * Model Download Service
 *
 * Composition root: one tracker, cache, monitor and supervisor per process,
 * built from configuration and shared by every route handler.
 */

import { loadConfig, type ServerConfig } from "@/lib/config"
import { OllamaClient, type OllamaModel } from "@/lib/llm/ollama-client"
import { DownloadSupervisor } from "./download-supervisor"
import { HealthCache } from "./health-cache"
import { HealthMonitor, type HealthPayload } from "./health-monitor"
import { ProgressTracker } from "./progress-tracker"
import { CliPullRunner, HttpPullRunner, type PullRunner } from "./pull-runner"
import { isModelListed } from "./status-reconciler"
import type { Clock, DownloadProgressSnapshot, StartResult } from "./types"

// ============ Types ============

export type DaemonClient = Pick<
  OllamaClient,
  | "baseUrl"
  | "isReachable"
  | "listModels"
  | "listModelDetails"
  | "isModelAvailable"
  | "probe"
  | "getVersion"
  | "generate"
  | "pull"
>

export type DownloadRequestResult = StartResult | { status: "disabled"; model: string }

export type ResetResult =
  | { status: "reset"; model: string }
  | { status: "not_available"; model: string }
  | { status: "daemon_unavailable"; model: string }

export interface ModelsResult {
  connected: boolean
  models: OllamaModel[]
  active_model: string
  active_model_available: boolean
  auto_download_disabled: boolean
  error?: string
}

export interface DebugInfo {
  config: {
    ollama_url: string
    active_model: string
    auto_download_disabled: boolean
    pull_mode: ServerConfig["pullMode"]
    health_cache_ttl_ms: number
    download_cooldown_ms: number
  }
  connection: {
    reachable: boolean
    version: string | null
    error?: string
  }
  models: string[]
  download_progress: DownloadProgressSnapshot
  supervisor: {
    running: boolean
  }
  health_cache_age_ms: number | null
  timestamp: string
}

export interface ServiceOverrides {
  client?: DaemonClient
  runner?: PullRunner
  now?: Clock
  /** Delay before the advisory post-download availability check */
  verifyDelayMs?: number
}

export class ModelDownloadService {
  readonly tracker: ProgressTracker
  readonly healthCache: HealthCache<HealthPayload>
  readonly monitor: HealthMonitor
  readonly supervisor: DownloadSupervisor

  constructor(
    readonly config: ServerConfig,
    readonly client: DaemonClient,
    runner: PullRunner,
    private readonly now: Clock = Date.now,
    verifyDelayMs?: number
  ) {
    this.tracker = new ProgressTracker({ now })
    this.healthCache = new HealthCache<HealthPayload>(config.healthCacheTtlMs, now)
    this.monitor = new HealthMonitor({
      tracker: this.tracker,
      daemon: client,
      cache: this.healthCache,
      model: config.activeModel,
      now,
    })
    this.supervisor = new DownloadSupervisor(
      { tracker: this.tracker, daemon: client, runner, healthCache: this.healthCache },
      {
        cooldownMs: config.downloadCooldownMs,
        stallTimeoutMs: config.pullStallTimeoutMs,
        hardTimeoutMs: config.pullHardTimeoutMs,
        verifyDelayMs,
        now,
      }
    )
  }

  health(): Promise<HealthPayload> {
    return this.monitor.check()
  }

  progress(): DownloadProgressSnapshot {
    return this.tracker.snapshot()
  }

  async requestDownload(modelId: string): Promise<DownloadRequestResult> {
    if (this.config.autoDownloadDisabled) {
      console.warn(`[ModelDownloadService] Download of ${modelId} refused: downloads are disabled`)
      return { status: "disabled", model: modelId }
    }
    return this.supervisor.start(modelId)
  }

  /**
   * Clear download state once the daemon confirms the model is present
   */
  async resetDownload(modelId: string): Promise<ResetResult> {
    const model = modelId.trim()
    if (!(await this.client.isReachable())) {
      return { status: "daemon_unavailable", model }
    }
    if (!(await this.client.isModelAvailable(model))) {
      return { status: "not_available", model }
    }

    console.log(`[ModelDownloadService] ${model} confirmed by the daemon, clearing download state`)
    this.tracker.clear()
    this.healthCache.invalidate()
    return { status: "reset", model }
  }

  async listModels(): Promise<ModelsResult> {
    const base = {
      active_model: this.config.activeModel,
      auto_download_disabled: this.config.autoDownloadDisabled,
    }
    try {
      const models = await this.client.listModelDetails()
      return {
        ...base,
        connected: true,
        models,
        active_model_available: isModelListed(
          models.map((model) => model.name),
          this.config.activeModel
        ),
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.warn("[ModelDownloadService] Could not list models:", message)
      return { ...base, connected: false, models: [], active_model_available: false, error: message }
    }
  }

  async debugInfo(): Promise<DebugInfo> {
    const probe = await this.client.probe()
    const version = probe.reachable ? await this.client.getVersion() : null

    return {
      config: {
        ollama_url: this.config.ollamaUrl,
        active_model: this.config.activeModel,
        auto_download_disabled: this.config.autoDownloadDisabled,
        pull_mode: this.config.pullMode,
        health_cache_ttl_ms: this.config.healthCacheTtlMs,
        download_cooldown_ms: this.config.downloadCooldownMs,
      },
      connection: {
        reachable: probe.reachable,
        version,
        ...(probe.error ? { error: probe.error } : {}),
      },
      models: probe.models,
      download_progress: this.tracker.snapshot(),
      supervisor: { running: this.supervisor.isRunning },
      health_cache_age_ms: this.healthCache.ageMs(),
      timestamp: new Date(this.now()).toISOString(),
    }
  }

  shutdown(timeoutMs?: number): Promise<void> {
    return this.supervisor.shutdown(timeoutMs)
  }
}

export function createModelDownloadService(
  config: ServerConfig = loadConfig(),
  overrides: ServiceOverrides = {}
): ModelDownloadService {
  const client = overrides.client ?? new OllamaClient(config.ollamaUrl, {
    generateTimeoutMs: config.generateTimeoutMs,
  })
  const runner = overrides.runner ?? (
    config.pullMode === "http" ? new HttpPullRunner(client) : new CliPullRunner(config.ollamaBinary)
  )

  console.log(
    `[ModelDownloadService] Using daemon at ${config.ollamaUrl}, model ${config.activeModel}, pull mode ${runner.kind}`
  )
  return new ModelDownloadService(config, client, runner, overrides.now, overrides.verifyDelayMs)
}

// Route modules can be evaluated more than once in dev; keep one instance per process
declare global {
  // eslint-disable-next-line no-var
  var modelDownloadService: ModelDownloadService | undefined
}

export function getModelDownloadService(): ModelDownloadService {
  if (!global.modelDownloadService) {
    global.modelDownloadService = createModelDownloadService()
  }
  return global.modelDownloadService
}

/**
 * Replace the shared instance (tests); pass undefined to drop it
 */
export function setModelDownloadService(service: ModelDownloadService | undefined): void {
  global.modelDownloadService = service
}
