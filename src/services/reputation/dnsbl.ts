import { Resolver } from "node:dns/promises"
import { isIpv4, reverseIpv4 } from "../../lib/network"
import type { ReputationKind } from "../../types"
import { unknownResult, type ProviderResult, type ReputationProvider } from "./provider"

export const TOR_EXIT_SENTINEL = "127.0.0.2"

// Codes meaning "no such record": the address is not listed.
const NOT_LISTED_CODES = new Set(["ENOTFOUND", "ENODATA", "NXDOMAIN"])

export type Resolve4 = (hostname: string) => Promise<string[]>

interface DnsblDependencies {
  resolve4?: Resolve4
  timeoutMs?: number
}

/** Tor exit detection through a reversed-octet DNS blacklist zone (IPv4 only). */
export class DnsblTorProvider implements ReputationProvider {
  readonly id = "dnsbl" as const
  readonly kinds: readonly ReputationKind[] = ["tor"]

  private readonly resolve4: Resolve4

  constructor(
    private readonly zone: string,
    dependencies: DnsblDependencies = {},
  ) {
    if (dependencies.resolve4) {
      this.resolve4 = dependencies.resolve4
    } else {
      const resolver = new Resolver({ timeout: dependencies.timeoutMs ?? 2_000, tries: 1 })
      this.resolve4 = (hostname) => resolver.resolve4(hostname)
    }
  }

  queryName(ip: string): string {
    return `${reverseIpv4(ip)}.${this.zone}`
  }

  async check(ip: string, _signal: AbortSignal): Promise<ProviderResult> {
    if (!isIpv4(ip)) {
      return unknownResult()
    }

    const query = this.queryName(ip)
    try {
      const answers = await this.resolve4(query)
      return {
        verdict: answers.includes(TOR_EXIT_SENTINEL) ? "flagged" : "clean",
        raw: { query, answers },
      }
    } catch (error) {
      if (isNotListedError(error)) {
        return { verdict: "clean", raw: { query, answers: [] } }
      }
      throw error
    }
  }
}

function isNotListedError(error: unknown): boolean {
  if (error === null || typeof error !== "object" || !("code" in error)) {
    return false
  }

  return typeof error.code === "string" && NOT_LISTED_CODES.has(error.code)
}
