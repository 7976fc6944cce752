/**
 * Model Download API Route
 * POST /api/download - start pulling a model in the background
 *
 * Body: { model: string }
 */

import { NextRequest, NextResponse } from "next/server"
import { modelRequestSchema, parseJsonBody } from "@/lib/api/validation"
import { downloadResponse } from "@/lib/api/download-response"
import { getModelDownloadService } from "@/lib/model-download/service"

export async function POST(request: NextRequest) {
  const body = await parseJsonBody(request, modelRequestSchema)
  if (!body.ok) {
    return NextResponse.json({ success: false, error: body.error }, { status: 400 })
  }

  try {
    const result = await getModelDownloadService().requestDownload(body.data.model)
    return downloadResponse(result)
  } catch (error) {
    console.error("[Download] Failed to start download:", error)
    return NextResponse.json(
      {
        success: false,
        error: `Failed to start download: ${error instanceof Error ? error.message : String(error)}`,
      },
      { status: 500 }
    )
  }
}
