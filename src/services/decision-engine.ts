import type pino from "pino"
import type { AuditSink } from "../db"
import type { RequestContext } from "../request-context"
import type { Settings } from "../settings"
import type { DecisionAction } from "../types"
import type { SlidingWindowRateLimiter } from "./rate-limiter"
import type { ReputationAggregator } from "./reputation/aggregator"
import type { UserAgentInspector } from "./user-agent"

export interface DecisionOutcome {
  action: DecisionAction
  reason: string
  suspicious: boolean
}

export interface DecisionEngineDependencies {
  aggregator: ReputationAggregator
  userAgents: UserAgentInspector
  rateLimiter: SlidingWindowRateLimiter
  auditSink: AuditSink
  logger: pino.Logger
}

export function suspiciousAction(settings: Readonly<Settings>): DecisionAction {
  return settings.action === "block_if_suspicious" ? "block" : "challenge"
}

/**
 * Turns a settings snapshot and the request's signals into allow, block or
 * challenge. Checks run cheapest first and reputation lookups only happen
 * once every local check has passed. Each call writes one audit entry.
 */
export class DecisionEngine {
  constructor(private readonly dependencies: DecisionEngineDependencies) {}

  async decide(ctx: RequestContext, settings: Readonly<Settings>): Promise<DecisionOutcome> {
    const outcome = await this.evaluate(ctx, settings)
    this.audit(ctx, outcome.action)
    return outcome
  }

  private async evaluate(ctx: RequestContext, settings: Readonly<Settings>): Promise<DecisionOutcome> {
    if (settings.action === "allow") {
      return { action: "allow", reason: "Rule action is allow", suspicious: false }
    }

    if (settings.action === "block") {
      return { action: "block", reason: "Rule action is block", suspicious: false }
    }

    if (settings.action === "fight") {
      return { action: "challenge", reason: "Rule action is fight", suspicious: false }
    }

    const suspicious = (reason: string): DecisionOutcome => ({
      action: suspiciousAction(settings),
      reason,
      suspicious: true,
    })

    const userAgent = this.dependencies.userAgents.inspect(ctx.userAgent, settings.enableCrawlerBlock)
    if (userAgent === "empty") {
      return suspicious("User agent is empty")
    }
    if (userAgent === "malformed") {
      return suspicious("User agent is malformed")
    }
    if (userAgent === "crawler") {
      return suspicious("User agent belongs to a crawler")
    }

    const ip = ctx.clientIp
    if (!ip) {
      return suspicious("Client IP is unknown")
    }

    if (settings.enableRateLimit) {
      const [limit, windowSeconds] = settings.rateLimit
      if (this.dependencies.rateLimiter.hit(ctx.fingerprint, limit, windowSeconds)) {
        return suspicious(`More than ${limit} requests within ${windowSeconds}s`)
      }
    }

    if (await this.dependencies.aggregator.classify(ip, settings.providers, "malicious")) {
      return suspicious("Client IP is classified as malicious")
    }

    if (await this.dependencies.aggregator.classify(ip, settings.providers, "tor")) {
      return suspicious("Client IP is a Tor exit node")
    }

    return { action: "allow", reason: "No risk signals", suspicious: false }
  }

  private audit(ctx: RequestContext, action: DecisionAction): void {
    try {
      this.dependencies.auditSink.append(ctx.fingerprint, {
        timestamp: Math.floor(ctx.receivedAt.getTime() / 1000),
        ip: ctx.clientIp,
        userAgent: ctx.userAgent,
        httpVersion: ctx.request.httpVersion,
        action,
      })
    } catch (error) {
      this.dependencies.logger.error(
        { fingerprint: ctx.fingerprint, action, error: error instanceof Error ? error.message : String(error) },
        "failed to append audit entry",
      )
    }
  }
}
