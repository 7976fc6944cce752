/**
 * Pull Output Parser
 *
 * Turns one line of `ollama pull` output into a structured progress update.
 * Handles both the CLI's human-readable progress bars and the JSON lines
 * streamed by the daemon's /api/pull endpoint.
 * Unrecognized lines fall back to an informational update.
 */

import type {
  InfoUpdate,
  ErrorUpdate,
  MilestonePhrase,
  ParseContext,
  ParsedUpdate,
} from "./types"

const PATTERNS = {
  // "pulling 8eeb52dfb3bb... 42%" (older CLI) or "pulling 8eeb52dfb3bb: 42%"
  layer: /pulling\s+([a-f0-9]+)(?:\.\.\.|:|\s|$)/,
  percent: /(\d+)%/,
  // "1.9 GB/4.1 GB"
  size: /(\d+\.?\d*)\s*([KMGT]?B)\/(\d+\.?\d*)\s*([KMGT]?B)/,
  // "125 MB/s"
  speed: /(\d+\.?\d*)\s*([KMGT]?B\/s)/,
  // Cursor and color sequences the CLI uses to redraw its bars
  ansiEscape: /\x1b\[[0-9;?]*[a-zA-Z]/g,
}

/**
 * Discrete phase transitions, checked in order. First match wins.
 */
const MILESTONES: ReadonlyArray<{
  phrase: MilestonePhrase
  status: string
  progress: number
  terminal: boolean
}> = [
  { phrase: "pulling manifest", status: "Initializing download...", progress: 2, terminal: false },
  { phrase: "verifying sha256 digest", status: "Verifying download...", progress: 95, terminal: false },
  { phrase: "writing manifest", status: "Installing model...", progress: 98, terminal: false },
  { phrase: "success", status: "Download complete!", progress: 100, terminal: true },
]

/** Layer lines are mapped into 5-90%; 0-5 and 90-100 belong to setup and install */
const LAYER_RANGE_START = 5
const LAYER_RANGE_SPAN = 85

interface MeasuredProgress {
  percent: number
  completed: string
  total: string
}

/**
 * Strip ANSI escape sequences from text
 */
export function stripAnsi(text: string): string {
  return text.replace(PATTERNS.ansiEscape, "")
}

/**
 * Map a raw layer percent into the 5-90 band of the overall bar
 */
export function rescalePercent(percent: number): number {
  const clamped = Math.min(100, Math.max(0, Math.floor(percent)))
  return LAYER_RANGE_START + Math.floor((clamped * LAYER_RANGE_SPAN) / 100)
}

/**
 * Format a byte count the way the pull CLI prints it ("4.1 GB")
 */
export function formatBytes(bytes: number): string {
  const units = ["KB", "MB", "GB", "TB"]
  if (bytes < 1000) return `${bytes} B`

  let value = bytes / 1000
  let unit = 0
  while (value >= 1000 && unit < units.length - 1) {
    value /= 1000
    unit++
  }
  return `${value.toFixed(1)} ${units[unit]}`
}

/**
 * Parse a single line of pull output.
 * Never throws; unparseable input yields an informational update.
 */
export function parseDownloadLine(line: string, context: ParseContext = {}): ParsedUpdate {
  const text = stripAnsi(line).trim()

  if (text.startsWith("{")) {
    const fromJson = parseJsonLine(text, context)
    if (fromJson) {
      return fromJson
    }
  }

  return parseTextLine(text, context)
}

function parseTextLine(
  text: string,
  context: ParseContext,
  layerHint?: string,
  measured?: MeasuredProgress
): ParsedUpdate {
  const layer = matchLayer(text) ?? layerHint ?? context.currentLayer ?? undefined

  for (const milestone of MILESTONES) {
    if (text.includes(milestone.phrase)) {
      return {
        kind: "milestone",
        message: text,
        phrase: milestone.phrase,
        status: milestone.status,
        progress: milestone.progress,
        terminal: milestone.terminal,
      }
    }
  }

  const previous = context.progress ?? 0

  let rawPercent: number | undefined
  if (text.includes("pulling")) {
    if (measured) {
      rawPercent = measured.percent
    } else if (text.includes("%")) {
      const percentMatch = PATTERNS.percent.exec(text)
      if (percentMatch) {
        rawPercent = parseInt(percentMatch[1], 10)
      }
    }
  }

  const sizes = measured ?? matchSizes(text)
  const speed = matchSpeed(text)

  if (rawPercent === undefined && !sizes && !speed) {
    return classifyFallback(text, layer)
  }

  let progress: number | undefined
  let layerCompleted = false
  if (rawPercent !== undefined) {
    const scaled = rescalePercent(rawPercent)
    if (scaled > previous) {
      progress = scaled
    }
    layerCompleted = layer !== undefined && rawPercent >= 99
  }

  const overall = progress ?? previous
  const status = layer
    ? `Downloading file: ${layer.slice(0, 8)}... (${overall}%)`
    : `Downloading model... (${overall}%)`

  return {
    kind: "progress",
    message: text,
    layer,
    status,
    progress,
    rawPercent,
    layerCompleted,
    completed: sizes?.completed,
    total: sizes?.total,
    speed,
  }
}

/**
 * Daemon stream lines: {"status":"pulling 8eeb52dfb3bb","digest":"sha256:...","total":N,"completed":M}
 */
function parseJsonLine(text: string, context: ParseContext): ParsedUpdate | null {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch {
    return null
  }

  if (typeof data !== "object" || data === null) {
    return null
  }

  const record: Record<string, unknown> = { ...data }

  if (typeof record.error === "string") {
    const failure: ErrorUpdate = { kind: "error", message: record.error.trim() }
    return failure
  }

  if (typeof record.status !== "string") {
    return null
  }

  const digestLayer = typeof record.digest === "string"
    ? record.digest.replace(/^sha256:/, "").slice(0, 12) || undefined
    : undefined

  let measured: MeasuredProgress | undefined
  if (typeof record.total === "number" && record.total > 0) {
    const completed = typeof record.completed === "number" ? record.completed : 0
    measured = {
      percent: Math.floor((completed / record.total) * 100),
      completed: formatBytes(completed),
      total: formatBytes(record.total),
    }
  }

  return parseTextLine(record.status.trim(), context, digestLayer, measured)
}

function matchLayer(text: string): string | undefined {
  const match = PATTERNS.layer.exec(text)
  return match ? match[1] : undefined
}

function matchSizes(text: string): { completed: string; total: string } | undefined {
  const match = PATTERNS.size.exec(text)
  if (!match) return undefined
  return {
    completed: `${match[1]} ${match[2]}`,
    total: `${match[3]} ${match[4]}`,
  }
}

function matchSpeed(text: string): string | undefined {
  const match = PATTERNS.speed.exec(text)
  return match ? `${match[1]} ${match[2]}` : undefined
}

function classifyFallback(text: string, layer: string | undefined): InfoUpdate | ErrorUpdate {
  const lower = text.toLowerCase()

  if (lower.includes("pulling")) {
    return { kind: "info", phase: "pulling", message: text, layer }
  }
  if (lower.includes("verifying")) {
    return { kind: "info", phase: "verifying", progress: 90, message: text, layer }
  }
  if (lower.includes("success") || lower.includes("complete")) {
    return { kind: "info", phase: "success", progress: 100, message: text, layer }
  }
  if (lower.includes("error") || lower.includes("failed")) {
    return { kind: "error", message: text, layer }
  }

  return { kind: "info", phase: "unknown", message: text, layer }
}
