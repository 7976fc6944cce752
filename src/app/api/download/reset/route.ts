/**
 * Download Reset API Route
 * POST /api/download/reset - clear stuck download state
 *
 * Only clears once the daemon confirms the model is present.
 */

import { NextRequest, NextResponse } from "next/server"
import { modelRequestSchema, parseJsonBody } from "@/lib/api/validation"
import { getModelDownloadService } from "@/lib/model-download/service"

export async function POST(request: NextRequest) {
  const body = await parseJsonBody(request, modelRequestSchema)
  if (!body.ok) {
    return NextResponse.json({ success: false, error: body.error }, { status: 400 })
  }

  try {
    const result = await getModelDownloadService().resetDownload(body.data.model)

    if (result.status === "daemon_unavailable") {
      return NextResponse.json(
        { success: false, error: "Ollama service is not available" },
        { status: 503 }
      )
    }
    if (result.status === "not_available") {
      return NextResponse.json(
        { success: false, error: `Model ${result.model} is not available yet; download state kept` },
        { status: 409 }
      )
    }

    return NextResponse.json({
      success: true,
      model: result.model,
      message: "Download state cleared",
    })
  } catch (error) {
    console.error("[DownloadReset] Reset failed:", error)
    return NextResponse.json(
      { success: false, error: error instanceof Error ? error.message : "Reset failed" },
      { status: 500 }
    )
  }
}
