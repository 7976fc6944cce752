/**
 * GET /health
 * Same payload as /api/health for probes that expect the bare path
 */

export { GET } from "../api/health/route"

export const dynamic = "force-dynamic"
