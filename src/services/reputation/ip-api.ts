import { z } from "zod"
import { ProviderError } from "../../lib/errors"
import type { ReputationKind } from "../../types"
import {
  matchesHostingOperator,
  unknownResult,
  type FetchLike,
  type ProviderResult,
  type ReputationProvider,
} from "./provider"

const IpApiResponseSchema = z.object({
  status: z.string().optional(),
  proxy: z.boolean().optional(),
  hosting: z.boolean().optional(),
  isp: z.string().optional(),
  org: z.string().optional(),
  as: z.string().optional(),
})

interface IpApiClientDependencies {
  fetchImpl?: FetchLike
  baseUrl?: string
}

/** ip-api.com: explicit proxy/hosting flags plus ISP, organization and AS names. */
export class IpApiProvider implements ReputationProvider {
  readonly id = "ipapi" as const
  readonly kinds: readonly ReputationKind[] = ["malicious"]

  private readonly fetchImpl: FetchLike
  private readonly baseUrl: string

  constructor(dependencies: IpApiClientDependencies = {}) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.baseUrl = (dependencies.baseUrl ?? "http://ip-api.com/json").replace(/\/+$/, "")
  }

  async check(ip: string, signal: AbortSignal): Promise<ProviderResult> {
    const endpoint = `${this.baseUrl}/${encodeURIComponent(ip)}?fields=status,proxy,hosting,isp,org,as`
    const response = await this.fetchImpl(endpoint, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal,
    })

    if (!response.ok) {
      throw new ProviderError(this.id, `returned ${response.status}`)
    }

    const parsed = IpApiResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      return unknownResult()
    }

    const data = parsed.data
    if (data.proxy === undefined && data.hosting === undefined) {
      return unknownResult(data)
    }

    const flagged =
      data.proxy === true ||
      data.hosting === true ||
      matchesHostingOperator(data.isp) ||
      matchesHostingOperator(data.org) ||
      matchesHostingOperator(data.as)

    return { verdict: flagged ? "flagged" : "clean", raw: data }
  }
}
