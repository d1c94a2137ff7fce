import { jsonResponse, type HttpResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleHealthz(ctx: ServerContext): HttpResponse {
  return jsonResponse({
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      rules_configured: Boolean(ctx.config.rulesPath),
      geoip_configured: Boolean(ctx.config.geoipPath),
      ipintel_contact_configured: Boolean(ctx.config.reputation.ipintelContact),
      default_action: ctx.config.defaultSettings.action,
      providers: ctx.config.defaultSettings.providers,
    },
  })
}
