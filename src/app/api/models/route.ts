/**
 * Models API Route
 * GET /api/models - models the daemon has installed
 */

import { NextResponse } from "next/server"
import { getModelDownloadService } from "@/lib/model-download/service"

export const dynamic = "force-dynamic"

export async function GET() {
  try {
    const result = await getModelDownloadService().listModels()
    return NextResponse.json(result, { status: result.connected ? 200 : 503 })
  } catch (error) {
    console.error("[Models] Failed to list models:", error)
    return NextResponse.json(
      { connected: false, error: error instanceof Error ? error.message : "Failed to list models" },
      { status: 500 }
    )
  }
}
