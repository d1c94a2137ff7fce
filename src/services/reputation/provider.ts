import type { ProviderName } from "../../settings"
import type { ReputationKind, Verdict } from "../../types"

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

export interface ProviderResult {
  verdict: Verdict
  // Whatever the provider returned, kept for the positive-verdict log line.
  raw: unknown
}

export interface ReputationProvider {
  readonly id: ProviderName
  readonly kinds: readonly ReputationKind[]
  check(ip: string, signal: AbortSignal): Promise<ProviderResult>
}

// Hosting, proxy and CDN operators; matched case-insensitively against ISP/ASN names.
export const HOSTING_OPERATORS = [
  "Fastly",
  "Incapsula",
  "Akamai",
  "AkamaiGslb",
  "Google",
  "Datacamp Limited",
  "Bing",
  "Censys",
  "Hetzner",
  "Linode",
  "Amazon",
  "AWS",
  "DigitalOcean",
  "Vultr",
  "Azure",
  "Alibaba",
  "Netlify",
  "IBM",
  "Oracle",
  "Scaleway",
  "OVH",
  "Cloud",
] as const

export function matchesHostingOperator(name: unknown): boolean {
  if (typeof name !== "string" || !name) {
    return false
  }

  const normalized = name.toLowerCase()
  return HOSTING_OPERATORS.some((operator) => normalized.includes(operator.toLowerCase()))
}

export function unknownResult(raw: unknown = null): ProviderResult {
  return { verdict: "unknown", raw }
}
