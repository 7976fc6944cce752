/**
 * Debug API Route
 * GET /api/debug - configuration, daemon connection and tracker state
 */

import { NextResponse } from "next/server"
import { getModelDownloadService } from "@/lib/model-download/service"

export const dynamic = "force-dynamic"

export async function GET() {
  try {
    return NextResponse.json(await getModelDownloadService().debugInfo())
  } catch (error) {
    console.error("[Debug] Failed to collect debug info:", error)
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Failed to collect debug info" },
      { status: 500 }
    )
  }
}
