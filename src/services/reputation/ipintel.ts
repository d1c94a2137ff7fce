import { ProviderError } from "../../lib/errors"
import type { ReputationKind } from "../../types"
import { unknownResult, type FetchLike, type ProviderResult, type ReputationProvider } from "./provider"

/**
 * GetIPIntel answers with a proxy/VPN probability between 0 and 1; negative
 * values are error codes.
 */
export const IPINTEL_PROBABILITY_THRESHOLD = 0.9

const PROBABILITY = /^-?\d+(\.\d+)?$/

interface IpIntelDependencies {
  fetchImpl?: FetchLike
  baseUrl?: string
  threshold?: number
}

export class IpIntelProvider implements ReputationProvider {
  readonly id = "ipintel" as const
  readonly kinds: readonly ReputationKind[] = ["malicious"]

  private readonly fetchImpl: FetchLike
  private readonly baseUrl: string
  private readonly threshold: number

  constructor(
    private readonly contact: string,
    dependencies: IpIntelDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.baseUrl = dependencies.baseUrl ?? "https://check.getipintel.net/check.php"
    this.threshold = dependencies.threshold ?? IPINTEL_PROBABILITY_THRESHOLD
  }

  async check(ip: string, signal: AbortSignal): Promise<ProviderResult> {
    if (!this.contact) {
      throw new ProviderError(this.id, "PORTCULLIS_IPINTEL_CONTACT is not configured")
    }

    const query = new URLSearchParams({ ip, contact: this.contact })
    const response = await this.fetchImpl(`${this.baseUrl}?${query.toString()}`, {
      method: "GET",
      signal,
    })

    if (!response.ok) {
      throw new ProviderError(this.id, `returned ${response.status}`)
    }

    const body = (await response.text()).trim()
    if (!PROBABILITY.test(body)) {
      return unknownResult(body)
    }

    const probability = Number.parseFloat(body)
    if (probability < 0 || probability > 1) {
      return unknownResult(body)
    }

    return { verdict: probability >= this.threshold ? "flagged" : "clean", raw: probability }
  }
}
