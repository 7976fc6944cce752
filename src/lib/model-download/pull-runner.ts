/**
 * Pull Runners
 *
 * Two ways to fetch a model, both exposed as a stream of text lines:
 * - CliPullRunner spawns `ollama pull <model>` and reads its terminal output
 * - HttpPullRunner streams the daemon's /api/pull JSON progress
 */

import { spawn } from "child_process"
import type { OllamaClient } from "@/lib/llm/ollama-client"

export interface PullExit {
  /** Process exit code; null when killed or never started */
  code: number | null
  signal?: string | null
  error?: string
}

export interface PullHandle {
  lines: AsyncIterable<string>
  /** Always resolves, never rejects */
  exit: Promise<PullExit>
  kill(): void
}

export interface PullRunner {
  readonly kind: "cli" | "http"
  start(modelId: string): PullHandle
}

/**
 * Buffers raw output and hands out complete lines in arrival order.
 * The CLI redraws its progress bar with carriage returns, so "\r" ends a line too.
 */
export class LineQueue implements AsyncIterable<string> {
  private buffered: string[] = []
  private partial = ""
  private ended = false
  private waiting: ((result: IteratorResult<string>) => void) | null = null

  write(chunk: string): void {
    if (this.ended) return
    const parts = (this.partial + chunk).split(/\r\n|\r|\n/)
    this.partial = parts.pop() ?? ""
    for (const part of parts) {
      if (part.trim()) this.push(part)
    }
  }

  end(): void {
    if (this.ended) return
    if (this.partial.trim()) this.push(this.partial)
    this.partial = ""
    this.ended = true
    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: undefined, done: true })
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: (): Promise<IteratorResult<string>> => {
        const line = this.buffered.shift()
        if (line !== undefined) {
          return Promise.resolve({ value: line, done: false })
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true })
        }
        return new Promise((resolve) => {
          this.waiting = resolve
        })
      },
    }
  }

  private push(line: string): void {
    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: line, done: false })
      return
    }
    this.buffered.push(line)
  }
}

export class CliPullRunner implements PullRunner {
  readonly kind = "cli"

  constructor(private readonly binary: string = "ollama") {}

  start(modelId: string): PullHandle {
    const queue = new LineQueue()

    console.log(`[PullRunner] Executing: ${this.binary} pull ${modelId}`)

    const child = spawn(this.binary, ["pull", modelId], {
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
    })

    // Progress bars go to stderr, plain messages to stdout
    child.stdout?.setEncoding("utf8")
    child.stderr?.setEncoding("utf8")
    child.stdout?.on("data", (data: string) => queue.write(data))
    child.stderr?.on("data", (data: string) => queue.write(data))

    const exit = new Promise<PullExit>((resolve) => {
      let settled = false
      const settle = (result: PullExit) => {
        queue.end()
        if (settled) return
        settled = true
        resolve(result)
      }

      child.on("error", (err) => {
        settle({ code: null, error: `Failed to start ${this.binary}: ${err.message}` })
      })

      child.on("close", (code, signal) => {
        settle({ code, signal })
      })
    })

    return {
      lines: queue,
      exit,
      kill: () => {
        if (child.exitCode === null && !child.killed) {
          child.kill("SIGTERM")
        }
      },
    }
  }
}

export class HttpPullRunner implements PullRunner {
  readonly kind = "http"

  constructor(private readonly client: Pick<OllamaClient, "pull">) {}

  start(modelId: string): PullHandle {
    const queue = new LineQueue()
    const controller = new AbortController()
    const exit = this.stream(modelId, queue, controller.signal)

    return {
      lines: queue,
      exit,
      kill: () => controller.abort(),
    }
  }

  private async stream(modelId: string, queue: LineQueue, signal: AbortSignal): Promise<PullExit> {
    try {
      const response = await this.client.pull(modelId, signal)
      if (!response.body) {
        return { code: 1, error: "Daemon returned an empty pull stream" }
      }

      const reader = response.body.getReader()
      const decoder = new TextDecoder()
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break
        queue.write(decoder.decode(value, { stream: true }))
      }
      queue.write(decoder.decode())
      return { code: 0 }
    } catch (error) {
      if (signal.aborted) {
        return { code: null, error: "Pull stream aborted" }
      }
      return { code: 1, error: error instanceof Error ? error.message : String(error) }
    } finally {
      queue.end()
    }
  }
}
