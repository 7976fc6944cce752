/**
 * Download Progress API Route
 * GET /api/download-progress
 */

import { NextResponse } from "next/server"
import { getModelDownloadService } from "@/lib/model-download/service"

export const dynamic = "force-dynamic"

export async function GET() {
  try {
    return NextResponse.json(getModelDownloadService().progress(), {
      headers: { "Cache-Control": "no-store" },
    })
  } catch (error) {
    console.error("[DownloadProgress] Failed to read progress:", error)
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "Failed to read download progress" },
      { status: 500 }
    )
  }
}
