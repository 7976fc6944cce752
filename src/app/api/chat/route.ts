/**
 * Chat API Route
 * POST /api/chat
 *
 * Body: { message: string, model?: string }
 */

import { NextRequest, NextResponse } from "next/server"
import { chatRequestSchema, parseJsonBody } from "@/lib/api/validation"
import { runChat } from "@/lib/llm/chat"
import { getModelDownloadService } from "@/lib/model-download/service"

export async function POST(request: NextRequest) {
  const body = await parseJsonBody(request, chatRequestSchema)
  if (!body.ok) {
    return NextResponse.json({ success: false, error: body.error }, { status: 400 })
  }

  try {
    const service = getModelDownloadService()
    const result = await runChat(service.client, body.data, service.config.activeModel)

    if (!result.ok) {
      return NextResponse.json({ success: false, error: result.error }, { status: result.status })
    }

    return NextResponse.json({
      success: true,
      response: result.response,
      model: result.model,
      response_time: result.response_time,
    })
  } catch (error) {
    console.error("[Chat] Request failed:", error)
    return NextResponse.json(
      { success: false, error: `Chat failed: ${error instanceof Error ? error.message : String(error)}` },
      { status: 500 }
    )
  }
}
