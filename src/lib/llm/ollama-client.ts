/**
 * Ollama Daemon Client
 *
 * Talks to the local model-serving daemon over its HTTP API:
 * reachability probes, model listing, generation and streaming pulls.
 * Every call carries its own timeout; nothing waits indefinitely.
 */

import { z } from "zod"
import { isModelListed } from "@/lib/model-download/status-reconciler"

// ============ Response Schemas ============

const tagsResponseSchema = z.object({
  models: z
    .array(
      z.object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
      })
    )
    .nullish()
    .transform((models) => models ?? []),
})

const versionResponseSchema = z.object({
  version: z.string(),
})

const generateResponseSchema = z.object({
  response: z.string().default(""),
  model: z.string().optional(),
  total_duration: z.number().optional(),
  eval_count: z.number().optional(),
})

export type OllamaModel = z.infer<typeof tagsResponseSchema>["models"][number]

export interface GenerateRequest {
  model: string
  prompt: string
  options?: {
    temperature?: number
    top_p?: number
    top_k?: number
  }
}

export type GenerateResponse = z.infer<typeof generateResponseSchema>

/**
 * What the download machinery needs from a daemon
 */
export interface ModelDaemon {
  isReachable(): Promise<boolean>
  listModels(): Promise<string[]>
  isModelAvailable(modelId: string): Promise<boolean>
}

export interface DaemonProbe {
  reachable: boolean
  models: string[]
  error?: string
}

export interface OllamaClientOptions {
  /** Reachability probes */
  probeTimeoutMs?: number
  /** Model listing */
  listTimeoutMs?: number
  /** Generation calls */
  generateTimeoutMs?: number
}

// ============ Error Types ============

export class OllamaError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = "OllamaError"
  }
}

export class OllamaTimeoutError extends OllamaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = "OllamaTimeoutError"
  }
}

export class OllamaUnavailableError extends OllamaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = "OllamaUnavailableError"
  }
}

/**
 * Readable reason for a failed fetch
 */
export function describeConnectionError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error)
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause.message : ""
  const detail = `${message} ${cause}`

  if (detail.includes("ECONNREFUSED")) {
    return "Connection refused - Ollama may not be running"
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return "Connection timed out - daemon may be unreachable"
  }
  if (detail.includes("ENOTFOUND") || detail.includes("getaddrinfo")) {
    return "Host not found - check OLLAMA_HOST"
  }
  return message
}

export class OllamaClient implements ModelDaemon {
  private readonly probeTimeoutMs: number
  private readonly listTimeoutMs: number
  private readonly generateTimeoutMs: number

  constructor(
    readonly baseUrl: string,
    options: OllamaClientOptions = {}
  ) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? 2000
    this.listTimeoutMs = options.listTimeoutMs ?? 10000
    this.generateTimeoutMs = options.generateTimeoutMs ?? 120000
  }

  /**
   * Any non-200 answer or connection failure counts as unreachable
   */
  async isReachable(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      })
      return response.ok
    } catch (error) {
      console.warn("[Ollama] Connection failed:", describeConnectionError(error))
      return false
    }
  }

  async listModels(): Promise<string[]> {
    const models = await this.listModelDetails()
    return models.map((model) => model.name)
  }

  async listModelDetails(): Promise<OllamaModel[]> {
    const data = await this.requestJson("/api/tags", this.listTimeoutMs)
    return tagsResponseSchema.parse(data).models
  }

  /**
   * Reachability and model list from a single request
   */
  async probe(): Promise<DaemonProbe> {
    try {
      const data = await this.requestJson("/api/tags", this.probeTimeoutMs)
      const { models } = tagsResponseSchema.parse(data)
      return { reachable: true, models: models.map((model) => model.name) }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      console.warn("[Ollama] Probe failed:", message)
      return { reachable: false, models: [], error: message }
    }
  }

  async isModelAvailable(modelId: string): Promise<boolean> {
    try {
      return isModelListed(await this.listModels(), modelId)
    } catch (error) {
      console.error("[Ollama] Error checking model availability:", error)
      return false
    }
  }

  async getVersion(): Promise<string | null> {
    try {
      const data = await this.requestJson("/api/version", 1000)
      return versionResponseSchema.parse(data).version
    } catch (error) {
      console.warn("[Ollama] Failed to get version:", error instanceof Error ? error.message : error)
      return null
    }
  }

  async generate(request: GenerateRequest): Promise<GenerateResponse> {
    const data = await this.requestJson(
      "/api/generate",
      this.generateTimeoutMs,
      JSON.stringify({ ...request, stream: false })
    )
    return generateResponseSchema.parse(data)
  }

  /**
   * Start a streaming pull. The body is newline-delimited JSON progress.
   */
  async pull(modelId: string, signal: AbortSignal): Promise<Response> {
    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/api/pull`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ name: modelId, stream: true }),
        signal,
      })
    } catch (error) {
      throw new OllamaUnavailableError(describeConnectionError(error), error)
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "")
      throw new OllamaError(`HTTP ${response.status}: ${text || response.statusText}`)
    }
    return response
  }

  /**
   * GET, or POST when a JSON body is given
   */
  private async requestJson(path: string, timeoutMs: number, body?: string): Promise<unknown> {
    let response: Response
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: body === undefined ? "GET" : "POST",
        headers: body === undefined
          ? { Accept: "application/json" }
          : { Accept: "application/json", "Content-Type": "application/json" },
        body,
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new OllamaTimeoutError(`Request to ${path} timed out after ${timeoutMs}ms`, error)
      }
      throw new OllamaUnavailableError(describeConnectionError(error), error)
    }

    if (!response.ok) {
      throw new OllamaError(`Ollama API error: ${response.status}`)
    }

    return response.json()
  }
}
