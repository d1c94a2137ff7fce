import { jsonResponse, type HttpResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleReadyz(ctx: ServerContext): HttpResponse {
  const ipintelEnabled = ctx.config.defaultSettings.providers.includes("ipintel")
  const dbReachable = ctx.db.isHealthy()
  const ipintelContactConfigured = !ipintelEnabled || Boolean(ctx.config.reputation.ipintelContact)

  const checks = {
    db_reachable: dbReachable,
    ipintel_required: ipintelEnabled,
    ipintel_contact_configured: ipintelContactConfigured,
  }

  // A missing ipintel contact only degrades that provider to "unknown".
  const ready = dbReachable
  return jsonResponse(
    {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
      checks,
    },
    ready ? 200 : 503,
  )
}
