/**
 * Health API Route
 * GET /api/health
 *
 * Reconciled model status plus download progress, daemon and system info.
 * Always answers 200: the body's status field carries the verdict.
 */

import { NextResponse } from "next/server"
import { collectSystemInfo } from "@/lib/model-download/health-monitor"
import { getModelDownloadService } from "@/lib/model-download/service"

export const dynamic = "force-dynamic"

export async function GET() {
  try {
    const service = getModelDownloadService()
    const payload = await service.health()
    const maxAge = Math.ceil(service.config.healthCacheTtlMs / 1000)

    return NextResponse.json(payload, {
      headers: { "Cache-Control": `public, max-age=${maxAge}` },
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error("[Health] Health check failed:", message)
    return NextResponse.json(
      {
        status: "error",
        error: message,
        system: collectSystemInfo(),
        timestamp: new Date().toISOString(),
        cached: false,
      },
      { headers: { "Cache-Control": "no-store" } }
    )
  }
}
