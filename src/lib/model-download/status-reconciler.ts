/**
 * Status Reconciliation
 *
 * Derives the reported model status from what the daemon says and what the
 * local tracker believes, correcting the tracker when the daemon already
 * has the model it thinks is still downloading.
 */

import type { ProgressTracker } from "./progress-tracker"
import type { ReconciledStatus } from "./types"

/** The daemon can lag behind a finished pull before listing the model */
export const COMPLETION_GRACE_MS = 30_000

export function computeStatus(
  daemonReachable: boolean,
  modelAvailable: boolean,
  tracker: ProgressTracker,
  now: number = Date.now()
): ReconciledStatus {
  // Exit detection can miss the daemon's own completion; the model list wins
  if (modelAvailable && tracker.isDownloading) {
    console.warn(
      `[StatusReconciler] ${tracker.model || "model"} is available but still marked as downloading - fixing state`
    )
    tracker.markReady()
  }

  if (!daemonReachable) {
    return "error"
  }

  const state = tracker.snapshot()

  if (state.downloading) {
    return "downloading"
  }

  if (modelAvailable) {
    return "ok"
  }

  if (
    state.last_outcome === "completed" &&
    state.completion_time !== null &&
    now - state.completion_time < COMPLETION_GRACE_MS
  ) {
    return "ok"
  }

  return "loading"
}

/**
 * Match a requested model id against the daemon's model names.
 * "llama3" matches "llama3:latest" and "llama3:8b"; "llama3:8b" only itself.
 */
export function isModelListed(models: string[], modelId: string): boolean {
  const wanted = modelId.trim()
  if (!wanted) return false

  const hasTag = wanted.includes(":")
  return models.some((name) => {
    if (name === wanted || name === `${wanted}:latest`) return true
    return !hasTag && name.startsWith(`${wanted}:`)
  })
}
