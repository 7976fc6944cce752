/**
 * Download Progress Tracker
 *
 * Holds the state of the one model pull this process can run at a time.
 * All mutations are synchronous methods, so a reader on the request path
 * never observes a half-applied update.
 */

import type {
  Clock,
  DownloadOutcome,
  DownloadProgressSnapshot,
  ParseContext,
  ParsedUpdate,
} from "./types"

interface ProgressState {
  downloading: boolean
  model: string
  status: string
  progress: number
  currentLayer: string | null
  /** Insertion-ordered set; serialized in that order */
  completedLayers: Set<string>
  layerProgress: Map<string, number>
  completed: string | null
  total: string | null
  speed: string | null
  message: string
  stalled: boolean
  startTime: number | null
  lastUpdate: number | null
  completionTime: number | null
  lastOutcome: DownloadOutcome | null
}

export interface ProgressTrackerOptions {
  now?: Clock
}

function idleState(): ProgressState {
  return {
    downloading: false,
    model: "",
    status: "Idle",
    progress: 0,
    currentLayer: null,
    completedLayers: new Set(),
    layerProgress: new Map(),
    completed: null,
    total: null,
    speed: null,
    message: "",
    stalled: false,
    startTime: null,
    lastUpdate: null,
    completionTime: null,
    lastOutcome: null,
  }
}

export class ProgressTracker {
  private state: ProgressState = idleState()
  private readonly now: Clock

  // Survive reset() and clear()
  private lastDownloadAttempt: number | null = null
  private apiCallCount = 0
  private downloadCount = 0

  /** Last time a tracked field actually changed; basis for stall detection */
  private lastChangeAt: number | null = null
  private statusBeforeStall = ""
  private stallMessage = ""

  constructor(options: ProgressTrackerOptions = {}) {
    this.now = options.now ?? Date.now
  }

  get isDownloading(): boolean {
    return this.state.downloading
  }

  get model(): string {
    return this.state.model
  }

  get lastDownloadAttemptTime(): number | null {
    return this.lastDownloadAttempt
  }

  /**
   * Begin tracking a new pull
   */
  reset(modelId: string): void {
    const now = this.now()
    this.state = {
      ...idleState(),
      downloading: true,
      model: modelId,
      status: "Starting download...",
      startTime: now,
      lastUpdate: now,
    }
    this.lastChangeAt = now
  }

  /**
   * Apply one parsed output line. Ignored unless a pull is active.
   * Returns true when the update changed tracked state.
   */
  applyUpdate(update: ParsedUpdate): boolean {
    const state = this.state
    if (!state.downloading) {
      return false
    }

    const before = this.fingerprint(state.stalled ? this.statusBeforeStall : state.status)
    state.message = update.message

    if (update.layer && update.layer !== state.currentLayer && !state.completedLayers.has(update.layer)) {
      state.currentLayer = update.layer
    }

    switch (update.kind) {
      case "milestone":
        state.status = update.status
        this.advance(update.progress)
        if (update.terminal) {
          this.complete("Download complete!")
        }
        break

      case "progress":
        state.status = update.status
        if (update.progress !== undefined) {
          this.advance(update.progress)
        }
        if (update.layer && update.rawPercent !== undefined) {
          state.layerProgress.set(update.layer, Math.min(100, update.rawPercent))
        }
        if (update.layer && update.layerCompleted) {
          state.completedLayers.add(update.layer)
        }
        if (update.completed !== undefined) state.completed = update.completed
        if (update.total !== undefined) state.total = update.total
        if (update.speed !== undefined) state.speed = update.speed
        break

      case "info":
        if (update.phase !== "unknown") {
          state.status = update.message
        }
        if (update.progress !== undefined) {
          this.advance(update.progress)
        }
        break

      case "error":
        // Terminal handling belongs to the supervisor; record what was said
        state.status = update.message
        break
    }

    const now = this.now()
    state.lastUpdate = now

    const changed = this.fingerprint(state.status) !== before
    if (changed) {
      this.lastChangeAt = now
      state.stalled = false
    } else if (state.stalled) {
      // A repeated line must not hide the stall notice
      state.status = this.stallMessage
    }
    return changed
  }

  /**
   * Advisory only: rewrites the status message, leaves numbers alone
   */
  markStalled(): void {
    const state = this.state
    if (!state.downloading || state.stalled) {
      return
    }
    const seconds = this.lastChangeAt === null
      ? 0
      : Math.floor((this.now() - this.lastChangeAt) / 1000)
    this.statusBeforeStall = state.status
    this.stallMessage = `Download stalled: no progress for ${seconds} seconds (${state.progress}%)`
    state.stalled = true
    state.status = this.stallMessage
  }

  /**
   * Finish the active pull successfully.
   * Returns false when there was no active pull to finish.
   */
  markCompleted(): boolean {
    if (!this.state.downloading) {
      return false
    }
    this.complete("Download complete!")
    return true
  }

  /**
   * Correct a pull the daemon already reports as finished
   */
  markReady(): void {
    const now = this.now()
    Object.assign(this.state, {
      downloading: false,
      status: "Model ready",
      progress: 100,
      stalled: false,
      completionTime: now,
      lastUpdate: now,
      lastOutcome: "completed",
    } satisfies Partial<ProgressState>)
  }

  markError(message: string): void {
    const now = this.now()
    Object.assign(this.state, {
      downloading: false,
      status: message,
      progress: 0,
      stalled: false,
      completionTime: now,
      lastUpdate: now,
      lastOutcome: "failed",
    } satisfies Partial<ProgressState>)
  }

  /**
   * Drop all download state. Rate-limit timestamp and counters are kept.
   */
  clear(): void {
    this.state = idleState()
    this.lastChangeAt = null
  }

  recordStatusCheck(): number {
    this.apiCallCount += 1
    return this.apiCallCount
  }

  recordDownloadAttempt(): void {
    this.lastDownloadAttempt = this.now()
  }

  /**
   * Milliseconds since a tracked field last changed, or null when idle
   */
  msSinceLastChange(): number | null {
    if (!this.state.downloading || this.lastChangeAt === null) {
      return null
    }
    return this.now() - this.lastChangeAt
  }

  parseContext(): ParseContext {
    return {
      currentLayer: this.state.currentLayer,
      progress: this.state.progress,
    }
  }

  snapshot(): DownloadProgressSnapshot {
    const state = this.state
    return {
      downloading: state.downloading,
      model: state.model,
      status: state.status,
      progress: state.progress,
      current_layer: state.currentLayer,
      completed_layers: Array.from(state.completedLayers),
      layer_progress: Object.fromEntries(state.layerProgress),
      completed: state.completed,
      total: state.total,
      speed: state.speed,
      message: state.message,
      stalled: state.stalled,
      start_time: state.startTime,
      last_update: state.lastUpdate,
      completion_time: state.completionTime,
      last_outcome: state.lastOutcome,
      last_download_attempt_time: this.lastDownloadAttempt,
      api_call_count: this.apiCallCount,
      download_count: this.downloadCount,
    }
  }

  private advance(progress: number): void {
    if (progress > this.state.progress) {
      this.state.progress = Math.min(100, progress)
    }
  }

  private complete(status: string): void {
    const now = this.now()
    Object.assign(this.state, {
      downloading: false,
      status,
      progress: 100,
      stalled: false,
      speed: null,
      completionTime: now,
      lastUpdate: now,
      lastOutcome: "completed",
    } satisfies Partial<ProgressState>)
    this.downloadCount += 1
  }

  // Everything except timestamps, the raw message and the stall flag
  private fingerprint(status: string): string {
    const state = this.state
    return JSON.stringify([
      state.downloading,
      status,
      state.progress,
      state.currentLayer,
      state.completedLayers.size,
      Array.from(state.layerProgress.entries()),
      state.completed,
      state.total,
      state.speed,
    ])
  }
}
