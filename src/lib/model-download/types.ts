/**
 * Model Download Types
 * Shared shapes for pull progress parsing, tracking and status reporting
 */

// ============ Parsed Output ============

export type MilestonePhrase =
  | "pulling manifest"
  | "verifying sha256 digest"
  | "writing manifest"
  | "success"

export type InfoPhase = "pulling" | "verifying" | "success" | "unknown"

interface ParsedUpdateBase {
  /** Trimmed source line */
  message: string
  /** Layer active for this line (captured here or carried over) */
  layer?: string
}

export interface MilestoneUpdate extends ParsedUpdateBase {
  kind: "milestone"
  phrase: MilestonePhrase
  status: string
  progress: number
  terminal: boolean
}

export interface LayerProgressUpdate extends ParsedUpdateBase {
  kind: "progress"
  status: string
  /** Rescaled overall percent, present only when it moves forward */
  progress?: number
  rawPercent?: number
  layerCompleted: boolean
  completed?: string
  total?: string
  speed?: string
}

export interface InfoUpdate extends ParsedUpdateBase {
  kind: "info"
  phase: InfoPhase
  progress?: number
}

export interface ErrorUpdate extends ParsedUpdateBase {
  kind: "error"
}

export type ParsedUpdate = MilestoneUpdate | LayerProgressUpdate | InfoUpdate | ErrorUpdate

export interface ParseContext {
  currentLayer?: string | null
  progress?: number
}

// ============ Tracker State ============

export type DownloadOutcome = "completed" | "failed"

export interface DownloadProgressSnapshot {
  downloading: boolean
  model: string
  status: string
  progress: number
  current_layer: string | null
  completed_layers: string[]
  layer_progress: Record<string, number>
  completed: string | null
  total: string | null
  speed: string | null
  message: string
  stalled: boolean
  start_time: number | null
  last_update: number | null
  completion_time: number | null
  last_outcome: DownloadOutcome | null
  last_download_attempt_time: number | null
  api_call_count: number
  download_count: number
}

// ============ Status ============

export type ReconciledStatus = "error" | "downloading" | "ok" | "loading"

export type StartResult =
  | { status: "started"; model: string }
  | { status: "already_running"; model: string }
  | { status: "already_available"; model: string }
  | { status: "rate_limited"; model: string; retryAfterSeconds: number }
  | { status: "daemon_unavailable"; model: string }

export type Clock = () => number
