import type { IncomingMessage, ServerResponse } from "node:http"
import { errorResponse, readBody, sendResponse, toInboundRequest, type HttpResponse } from "./lib/http"
import { handleGate } from "./routes/gate"
import { handleHealthz } from "./routes/healthz"
import { handleReadyz } from "./routes/readyz"
import type { ServerContext } from "./server-context"

export async function route(req: IncomingMessage, ctx: ServerContext): Promise<HttpResponse> {
  const pathname = (req.url ?? "/").split("?")[0]

  if (pathname === "/healthz") {
    return handleHealthz(ctx)
  }

  if (pathname === "/readyz") {
    return handleReadyz(ctx)
  }

  const rawBody = await readBody(req)
  return handleGate(toInboundRequest(req, rawBody), ctx)
}

export function createRequestListener(ctx: ServerContext): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const started = Date.now()

    route(req, ctx)
      .catch((error: unknown) => {
        ctx.loggers.app.error(
          { error: error instanceof Error ? error.message : String(error), url: req.url },
          "request handling failed",
        )
        return errorResponse(500, "Internal server error")
      })
      .then((response) => {
        sendResponse(res, response)
        ctx.loggers.app.info(
          {
            method: req.method,
            pathname: (req.url ?? "/").split("?")[0],
            status: response.status,
            durationMs: Date.now() - started,
          },
          "http request",
        )
      })
      .catch((error: unknown) => {
        ctx.loggers.app.error({ error: error instanceof Error ? error.message : String(error) }, "failed to send response")
      })
  }
}
