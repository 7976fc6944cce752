/**
 * Chat
 * Sends a single user message to the daemon with the infrastructure prompt
 */

import {
  OllamaError,
  OllamaTimeoutError,
  OllamaUnavailableError,
  type OllamaClient,
} from "./ollama-client"
import { buildChatPrompt, CHAT_OPTIONS } from "./prompts"

export interface ChatRequest {
  message: string
  model?: string
}

export type ChatResult =
  | { ok: true; response: string; model: string; response_time: number }
  | { ok: false; status: 502 | 503 | 504; error: string }

export type ChatDaemon = Pick<OllamaClient, "isReachable" | "generate">

export async function runChat(
  daemon: ChatDaemon,
  request: ChatRequest,
  defaultModel: string,
  now: () => number = Date.now
): Promise<ChatResult> {
  const startedAt = now()
  const model = request.model?.trim() || defaultModel

  if (!(await daemon.isReachable())) {
    return { ok: false, status: 503, error: "Ollama service is not available" }
  }

  try {
    const result = await daemon.generate({
      model,
      prompt: buildChatPrompt(request.message),
      options: { ...CHAT_OPTIONS },
    })

    return {
      ok: true,
      response: result.response,
      model,
      response_time: Math.round((now() - startedAt) / 10) / 100,
    }
  } catch (error) {
    if (error instanceof OllamaTimeoutError) {
      return { ok: false, status: 504, error: "Request timeout - response took too long" }
    }
    if (error instanceof OllamaUnavailableError) {
      return { ok: false, status: 503, error: `Request failed: ${error.message}` }
    }
    if (error instanceof OllamaError) {
      return { ok: false, status: 502, error: `LLM service returned an error: ${error.message}` }
    }
    console.error("[Chat] Generation failed:", error)
    return {
      ok: false,
      status: 502,
      error: `Error communicating with LLM service: ${error instanceof Error ? error.message : String(error)}`,
    }
  }
}
