import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http"
import type { InboundRequest } from "../types"

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: string
}

const MAX_BODY_BYTES = 1024 * 1024

export function jsonResponse(payload: unknown, status = 200): HttpResponse {
  return {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
    body: JSON.stringify(payload),
  }
}

export function errorResponse(status: number, message: string, details?: unknown): HttpResponse {
  return jsonResponse(
    {
      error: {
        message,
        details,
      },
    },
    status,
  )
}

export function htmlResponse(html: string, status = 200): HttpResponse {
  return {
    status,
    headers: {
      "content-type": "text/html; charset=utf-8",
      "cache-control": "no-store",
    },
    body: html,
  }
}

export function textResponse(text: string, status = 200): HttpResponse {
  return {
    status,
    headers: {
      "content-type": "text/plain; charset=utf-8",
    },
    body: text,
  }
}

export function sendResponse(res: ServerResponse, response: HttpResponse): void {
  res.writeHead(response.status, {
    ...response.headers,
    "content-length": Buffer.byteLength(response.body),
  })
  res.end(response.body)
}

/** Reads the request body as text; null when it exceeds `limitBytes`. */
export async function readBody(req: IncomingMessage, limitBytes = MAX_BODY_BYTES): Promise<string | null> {
  const chunks: Buffer[] = []
  let size = 0
  let tooLarge = false

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    size += buffer.byteLength
    if (size > limitBytes) {
      tooLarge = true
      continue
    }
    chunks.push(buffer)
  }

  return tooLarge ? null : Buffer.concat(chunks).toString("utf8")
}

export function parseJsonBody(raw: string | null): unknown {
  if (!raw) {
    return null
  }

  try {
    return JSON.parse(raw)
  } catch {
    return null
  }
}

export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string | undefined> {
  const flat: Record<string, string | undefined> = {}
  for (const [name, value] of Object.entries(headers)) {
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value
  }
  return flat
}

export function parseQuery(search: URLSearchParams): Record<string, string | string[]> {
  const query: Record<string, string | string[]> = {}
  for (const [key, value] of search) {
    const existing = query[key]
    if (existing === undefined) {
      query[key] = value
    } else if (Array.isArray(existing)) {
      existing.push(value)
    } else {
      query[key] = [existing, value]
    }
  }
  return query
}

/** Adapts a node:http request to the evaluator's request accessor. */
export function toInboundRequest(req: IncomingMessage, rawBody: string | null): InboundRequest {
  const headers = flattenHeaders(req.headers)
  const encrypted = "encrypted" in req.socket && req.socket.encrypted === true
  const scheme = encrypted ? "https" : "http"
  const host = headers.host ?? "localhost"

  let url: URL
  try {
    url = new URL(req.url ?? "/", `${scheme}://${host}`)
  } catch {
    url = new URL(`${scheme}://localhost/`)
  }

  const isJson = (headers["content-type"] ?? "").toLowerCase().includes("json")

  return {
    method: req.method ?? "GET",
    url: url.toString(),
    host,
    scheme,
    path: url.pathname,
    query: parseQuery(url.searchParams),
    headers,
    body: isJson ? parseJsonBody(rawBody) : rawBody,
    httpVersion: `HTTP/${req.httpVersion}`,
    remoteAddress: req.socket.remoteAddress ?? null,
  }
}
