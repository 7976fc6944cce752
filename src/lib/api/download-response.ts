/**
 * Maps a download request result onto its HTTP response
 */

import { NextResponse } from "next/server"
import type { DownloadRequestResult } from "@/lib/model-download/service"

export function downloadResponse(result: DownloadRequestResult) {
  switch (result.status) {
    case "started":
      return NextResponse.json({
        success: true,
        status: result.status,
        model: result.model,
        message: `Download of ${result.model} started`,
      })
    case "already_available":
      return NextResponse.json({
        success: true,
        status: result.status,
        model: result.model,
        message: `Model ${result.model} is already available`,
      })
    case "already_running":
      return NextResponse.json(
        {
          success: true,
          status: result.status,
          model: result.model,
          message: "Download already in progress",
        },
        { status: 202 }
      )
    case "rate_limited":
      return NextResponse.json(
        {
          success: false,
          status: result.status,
          error: `Too many download requests. Try again in ${result.retryAfterSeconds} seconds`,
          retry_after_seconds: result.retryAfterSeconds,
        },
        { status: 429, headers: { "Retry-After": String(result.retryAfterSeconds) } }
      )
    case "daemon_unavailable":
      return NextResponse.json(
        { success: false, status: result.status, error: "Ollama service is not available" },
        { status: 503 }
      )
    case "disabled":
      return NextResponse.json(
        { success: false, status: result.status, error: "Model downloads are disabled" },
        { status: 403 }
      )
  }
}
