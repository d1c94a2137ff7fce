import type { AuditSink } from "../src/db"
import type { ProviderName } from "../src/settings"
import type { ProviderResult, ReputationProvider } from "../src/services/reputation/provider"
import type { AuditRecord, InboundRequest, ReputationKind, Verdict } from "../src/types"

export const BROWSER_UA =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36"

export function makeRequest(overrides: Partial<InboundRequest> = {}): InboundRequest {
  return {
    method: "GET",
    url: "http://www.example.com/",
    host: "www.example.com",
    scheme: "http",
    path: "/",
    query: {},
    headers: { "user-agent": BROWSER_UA },
    body: null,
    httpVersion: "HTTP/1.1",
    remoteAddress: "1.2.3.4",
    ...overrides,
  }
}

export class MemoryAuditSink implements AuditSink {
  readonly entries: Array<AuditRecord & { fingerprint: string }> = []

  append(fingerprint: string, record: AuditRecord): boolean {
    this.entries.push({ fingerprint, ...record })
    return true
  }
}

export class MockProvider implements ReputationProvider {
  calls: string[] = []

  constructor(
    readonly id: ProviderName,
    readonly kinds: readonly ReputationKind[],
    private readonly handler: (ip: string, signal: AbortSignal) => Promise<ProviderResult>,
  ) {}

  async check(ip: string, signal: AbortSignal): Promise<ProviderResult> {
    this.calls.push(ip)
    return this.handler(ip, signal)
  }
}

export function fixedVerdict(verdict: Verdict): () => Promise<ProviderResult> {
  return async () => ({ verdict, raw: { verdict } })
}

export function jsonFetchResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

export function textFetchResponse(body: string, status = 200): Response {
  return new Response(body, { status })
}
