/**
 * Server Configuration
 *
 * All settings come from environment variables, validated once at startup.
 */

import { z } from "zod"

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value)

function positiveInt(fallback: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback))
}

const flag = z
  .string()
  .optional()
  .transform((value) => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase()))

const envSchema = z.object({
  OLLAMA_HOST: z.preprocess(emptyToUndefined, z.string().default("localhost")),
  OLLAMA_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(11434)),
  MODEL_NAME: z.preprocess(emptyToUndefined, z.string().default("codellama:13b-instruct")),
  AUTO_DOWNLOAD_DISABLED: flag,
  PULL_MODE: z.preprocess(emptyToUndefined, z.enum(["cli", "http"]).default("cli")),
  OLLAMA_BIN: z.preprocess(emptyToUndefined, z.string().default("ollama")),
  HEALTH_CACHE_TTL_MS: positiveInt(3_000),
  GENERATE_TIMEOUT_MS: positiveInt(120_000),
  PULL_HARD_TIMEOUT_MS: positiveInt(300_000),
  PULL_STALL_TIMEOUT_MS: positiveInt(60_000),
  DOWNLOAD_COOLDOWN_MS: positiveInt(5_000),
})

export interface ServerConfig {
  ollamaHost: string
  ollamaPort: number
  ollamaUrl: string
  activeModel: string
  autoDownloadDisabled: boolean
  pullMode: "cli" | "http"
  ollamaBinary: string
  healthCacheTtlMs: number
  generateTimeoutMs: number
  pullHardTimeoutMs: number
  pullStallTimeoutMs: number
  downloadCooldownMs: number
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ")
    throw new Error(`Invalid configuration: ${issues}`)
  }

  const parsed = result.data
  return {
    ollamaHost: parsed.OLLAMA_HOST,
    ollamaPort: parsed.OLLAMA_PORT,
    ollamaUrl: `http://${parsed.OLLAMA_HOST}:${parsed.OLLAMA_PORT}`,
    activeModel: parsed.MODEL_NAME,
    autoDownloadDisabled: parsed.AUTO_DOWNLOAD_DISABLED,
    pullMode: parsed.PULL_MODE,
    ollamaBinary: parsed.OLLAMA_BIN,
    healthCacheTtlMs: parsed.HEALTH_CACHE_TTL_MS,
    generateTimeoutMs: parsed.GENERATE_TIMEOUT_MS,
    pullHardTimeoutMs: parsed.PULL_HARD_TIMEOUT_MS,
    pullStallTimeoutMs: parsed.PULL_STALL_TIMEOUT_MS,
    downloadCooldownMs: parsed.DOWNLOAD_COOLDOWN_MS,
  }
}
