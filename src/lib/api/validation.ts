/**
 * Request Body Validation
 */

import { z } from "zod"

export const modelRequestSchema = z.object({
  model: z.string({ required_error: "Model name is required" }).trim().min(1, "Model name is required"),
})

export const chatRequestSchema = z.object({
  message: z.string({ required_error: "Message is required" }).trim().min(1, "Message is required"),
  model: z.string().trim().optional(),
})

export type BodyResult<T> = { ok: true; data: T } | { ok: false; error: string }

/**
 * Read a JSON body and validate it. Reports the first issue only.
 */
export async function parseJsonBody<T>(request: Request, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<BodyResult<T>> {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    return { ok: false, error: "Request body must be valid JSON" }
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    return { ok: false, error: result.error.issues[0].message }
  }
  return { ok: true, data: result.data }
}
