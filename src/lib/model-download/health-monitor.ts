/**
 * Health Monitor
 *
 * Builds the health payload for the active model. Probes the daemon,
 * reconciles the status against the tracker and caches idle results for a
 * few seconds. Never throws: failures come back as a payload with
 * status "error".
 */

import * as os from "os"
import type { OllamaClient } from "@/lib/llm/ollama-client"
import type { HealthCache } from "./health-cache"
import type { ProgressTracker } from "./progress-tracker"
import { computeStatus, isModelListed } from "./status-reconciler"
import type { Clock, DownloadProgressSnapshot, ReconciledStatus } from "./types"

// ============ Types ============

export interface DaemonHealth {
  connected: boolean
  url: string
  version: string | null
  models: string[]
  model_available: boolean
  error?: string
}

export interface SystemInfo {
  platform: string
  arch: string
  node_version: string
  uptime_seconds: number
  load_average: number[]
  memory: {
    rss_mb: number
    heap_used_mb: number
    free_mb: number
    total_mb: number
  }
}

export interface HealthPayload {
  status: ReconciledStatus
  model: string
  download_progress: DownloadProgressSnapshot
  ollama: DaemonHealth
  system: SystemInfo
  timestamp: string
  cached: boolean
  api_call_count: number
  error?: string
}

export type HealthDaemon = Pick<OllamaClient, "baseUrl" | "probe" | "getVersion">

export interface HealthMonitorDeps {
  tracker: ProgressTracker
  daemon: HealthDaemon
  cache: HealthCache<HealthPayload>
  model: string
  now?: Clock
}

const toMb = (bytes: number) => Math.round(bytes / (1024 * 1024))

export function collectSystemInfo(): SystemInfo {
  const memory = process.memoryUsage()
  return {
    platform: os.platform(),
    arch: os.arch(),
    node_version: process.version,
    uptime_seconds: Math.round(process.uptime()),
    load_average: os.loadavg(),
    memory: {
      rss_mb: toMb(memory.rss),
      heap_used_mb: toMb(memory.heapUsed),
      free_mb: toMb(os.freemem()),
      total_mb: toMb(os.totalmem()),
    },
  }
}

export class HealthMonitor {
  private readonly tracker: ProgressTracker
  private readonly daemon: HealthDaemon
  private readonly cache: HealthCache<HealthPayload>
  private readonly now: Clock
  readonly model: string

  constructor(deps: HealthMonitorDeps) {
    this.tracker = deps.tracker
    this.daemon = deps.daemon
    this.cache = deps.cache
    this.model = deps.model
    this.now = deps.now ?? Date.now
  }

  async check(): Promise<HealthPayload> {
    const apiCallCount = this.tracker.recordStatusCheck()

    // Progress must stay live while a pull runs
    if (!this.tracker.isDownloading) {
      const cached = this.cache.get(this.model)
      if (cached) {
        return { ...cached, cached: true, api_call_count: apiCallCount }
      }
    }

    try {
      const probe = await this.daemon.probe()
      const modelAvailable = probe.reachable && isModelListed(probe.models, this.model)

      // Only the model being pulled can end its own download
      const trackedModel = this.tracker.isDownloading ? this.tracker.model : this.model
      const trackedAvailable =
        trackedModel === this.model ? modelAvailable : probe.reachable && isModelListed(probe.models, trackedModel)
      let status = computeStatus(probe.reachable, trackedAvailable, this.tracker, this.now())
      if (trackedModel !== this.model && !this.tracker.isDownloading) {
        status = computeStatus(probe.reachable, modelAvailable, this.tracker, this.now())
      }
      const version = probe.reachable ? await this.daemon.getVersion() : null

      const payload: HealthPayload = {
        status,
        model: this.model,
        download_progress: this.tracker.snapshot(),
        ollama: {
          connected: probe.reachable,
          url: this.daemon.baseUrl,
          version,
          models: probe.models,
          model_available: modelAvailable,
          ...(probe.error ? { error: probe.error } : {}),
        },
        system: collectSystemInfo(),
        timestamp: new Date(this.now()).toISOString(),
        cached: false,
        api_call_count: apiCallCount,
      }

      if (!this.tracker.isDownloading) {
        this.cache.set(this.model, payload)
      }
      return payload
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.error("[HealthMonitor] Health check failed:", message)
      return this.degraded(message, apiCallCount)
    }
  }

  private degraded(message: string, apiCallCount: number): HealthPayload {
    return {
      status: "error",
      model: this.model,
      download_progress: this.tracker.snapshot(),
      ollama: {
        connected: false,
        url: this.daemon.baseUrl,
        version: null,
        models: [],
        model_available: false,
        error: message,
      },
      system: collectSystemInfo(),
      timestamp: new Date(this.now()).toISOString(),
      cached: false,
      api_call_count: apiCallCount,
      error: message,
    }
  }
}
