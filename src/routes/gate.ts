import { htmlResponse, textResponse, type HttpResponse } from "../lib/http"
import type { ServerContext } from "../server-context"
import type { InboundRequest } from "../types"

export async function handleGate(request: InboundRequest, ctx: ServerContext): Promise<HttpResponse> {
  const decision = await ctx.evaluator.evaluate(request)

  if (decision.action === "allow") {
    return textResponse(ctx.config.upstreamMessage, decision.status)
  }

  const templateId = decision.action === "block" ? "access_denied" : "challenge"
  const response = htmlResponse(ctx.renderer.render(templateId, decision.variables), decision.status)
  response.headers["x-portcullis-action"] = decision.action
  return response
}
