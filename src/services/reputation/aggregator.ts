import type pino from "pino"
import { ProviderError } from "../../lib/errors"
import type { TtlCache } from "../../lib/ttl-cache"
import type { ProviderName } from "../../settings"
import type { ReputationKind, Verdict } from "../../types"
import type { ProviderResult, ReputationProvider } from "./provider"

export type DefiniteVerdict = Exclude<Verdict, "unknown">

export interface FlaggedEvent {
  provider: ProviderName
  kind: ReputationKind
  ip: string
  raw: unknown
}

export type ReputationSink = (event: FlaggedEvent) => void

export interface ReputationAggregatorOptions {
  cache: TtlCache<DefiniteVerdict>
  logger: pino.Logger
  timeoutMs: number
  timeoutOverrides?: Partial<Record<ProviderName, number>>
  sink?: ReputationSink
  setTimeoutImpl?: typeof setTimeout
  clearTimeoutImpl?: typeof clearTimeout
}

export interface ClassifyOptions {
  sink?: ReputationSink
}

/**
 * Asks reputation providers in order until one flags the address. Unknown
 * answers (errors, timeouts, nothing classifiable) fall through to the next
 * provider and are never cached; definite answers are cached per
 * (provider, ip).
 */
export class ReputationAggregator {
  private readonly providers: Map<ProviderName, ReputationProvider>
  private readonly setTimeoutImpl: typeof setTimeout
  private readonly clearTimeoutImpl: typeof clearTimeout

  constructor(
    providers: readonly ReputationProvider[],
    private readonly options: ReputationAggregatorOptions,
  ) {
    this.providers = new Map(providers.map((provider) => [provider.id, provider]))
    this.setTimeoutImpl = options.setTimeoutImpl ?? setTimeout
    this.clearTimeoutImpl = options.clearTimeoutImpl ?? clearTimeout
  }

  /** Providers consulted for `kind`, in order. GeoIP always goes last. */
  chainFor(enabled: readonly ProviderName[], kind: ReputationKind): ReputationProvider[] {
    const chain: ReputationProvider[] = []
    let geoip: ReputationProvider | undefined

    for (const name of new Set(enabled)) {
      const provider = this.providers.get(name)
      if (!provider || !provider.kinds.includes(kind)) {
        continue
      }

      if (provider.id === "geoip") {
        geoip = provider
        continue
      }

      chain.push(provider)
    }

    if (geoip) {
      chain.push(geoip)
    }

    return chain
  }

  /** Cache namespace of the combined verdict; it depends on the consulted chain. */
  aggregateKey(chain: readonly ReputationProvider[], kind: ReputationKind): string {
    return `aggregate:${kind}:${chain.map((provider) => provider.id).join(",")}`
  }

  async classify(
    ip: string,
    enabled: readonly ProviderName[],
    kind: ReputationKind,
    classifyOptions: ClassifyOptions = {},
  ): Promise<boolean> {
    const chain = this.chainFor(enabled, kind)
    if (chain.length === 0) {
      return false
    }

    const aggregateKey = this.aggregateKey(chain, kind)
    const cached = this.options.cache.get(aggregateKey, ip)
    if (cached !== undefined) {
      return cached === "flagged"
    }

    const sink = classifyOptions.sink ?? this.options.sink
    let sawDefinite = false

    for (const provider of chain) {
      const verdict = await this.checkProvider(provider, ip, kind, sink)
      if (verdict === "flagged") {
        this.options.cache.set(aggregateKey, ip, "flagged")
        return true
      }

      if (verdict === "clean") {
        sawDefinite = true
      }
    }

    // With every provider unknown the answer is "not flagged", but it is not
    // remembered, so the next request asks again.
    if (sawDefinite) {
      this.options.cache.set(aggregateKey, ip, "clean")
    }

    return false
  }

  async checkProvider(
    provider: ReputationProvider,
    ip: string,
    kind: ReputationKind,
    sink?: ReputationSink,
  ): Promise<Verdict> {
    try {
      const verdict = await this.options.cache.getOrLoad(provider.id, ip, async () => {
        const result = await this.runWithTimeout(provider, ip)
        if (result.verdict === "flagged") {
          sink?.({ provider: provider.id, kind, ip, raw: result.raw })
        }

        return result.verdict === "unknown" ? undefined : result.verdict
      })

      return verdict ?? "unknown"
    } catch (error) {
      this.options.logger.warn(
        { provider: provider.id, kind, error: describeError(error) },
        "reputation provider failed; treating verdict as unknown",
      )
      return "unknown"
    }
  }

  private async runWithTimeout(provider: ReputationProvider, ip: string): Promise<ProviderResult> {
    const timeoutMs = this.options.timeoutOverrides?.[provider.id] ?? this.options.timeoutMs
    const controller = new AbortController()
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined

    const timeout = new Promise<never>((_resolve, reject) => {
      timeoutHandle = this.setTimeoutImpl(() => {
        controller.abort()
        reject(new ProviderError(provider.id, `timed out after ${timeoutMs}ms`))
      }, timeoutMs)
    })

    try {
      return await Promise.race([provider.check(ip, controller.signal), timeout])
    } finally {
      this.clearTimeoutImpl(timeoutHandle)
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
