/**
 * Server startup hook
 * Joins (or kills) a running model pull when the server is asked to stop
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return

  const { getModelDownloadService } = await import("@/lib/model-download/service")

  const stop = async (signal: NodeJS.Signals) => {
    console.log(`[Server] Received ${signal}, waiting for background downloads`)
    try {
      await getModelDownloadService().shutdown(5_000)
    } catch (error) {
      console.error("[Server] Shutdown failed:", error)
    }
    process.exit(0)
  }

  process.once("SIGTERM", (signal) => void stop(signal))
  process.once("SIGINT", (signal) => void stop(signal))
}
