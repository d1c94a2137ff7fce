import type { Loggers } from "../logger"
import { RequestContext } from "../request-context"
import type { Settings } from "../settings"
import type { Decision, DecisionAction, InboundRequest, RenderVariables } from "../types"
import type { DecisionEngine } from "./decision-engine"
import type { FieldResolver } from "./field-resolver"
import type { SettingsResolver } from "./settings-resolver"

export const STATUS_BY_ACTION: Record<DecisionAction, number> = {
  allow: 200,
  block: 403,
  challenge: 429,
}

export interface RequestEvaluatorDependencies {
  fieldResolver: FieldResolver
  settingsResolver: SettingsResolver
  engine: DecisionEngine
  loggers: Loggers
  fingerprintSecret: string
  now?: () => Date
}

export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`
}

export class RequestEvaluator {
  private readonly now: () => Date

  constructor(private readonly dependencies: RequestEvaluatorDependencies) {
    this.now = dependencies.now ?? (() => new Date())
  }

  async evaluate(request: InboundRequest): Promise<Decision> {
    const ctx = new RequestContext(request, this.dependencies.fingerprintSecret, this.now())
    const settings = await this.settingsFor(ctx)
    const outcome = await this.dependencies.engine.decide(ctx, settings)

    if (outcome.action !== "allow") {
      this.dependencies.loggers.security.info(
        {
          fingerprint: ctx.fingerprint,
          ip: ctx.clientIp,
          action: outcome.action,
          reason: outcome.reason,
          path: request.path,
        },
        `request ${outcome.action === "block" ? "blocked" : "challenged"}`,
      )
    }

    return {
      action: outcome.action,
      status: STATUS_BY_ACTION[outcome.action],
      reason: outcome.reason,
      variables: this.renderVariables(ctx, settings),
    }
  }

  private async settingsFor(ctx: RequestContext): Promise<Readonly<Settings>> {
    try {
      return await this.dependencies.settingsResolver.settingsFor(ctx)
    } catch (error) {
      this.dependencies.loggers.app.error(
        { error: error instanceof Error ? error.message : String(error), path: ctx.request.path },
        "settings resolution failed; using defaults",
      )
      ctx.settings = this.dependencies.settingsResolver.defaultSettings
      return ctx.settings
    }
  }

  private renderVariables(ctx: RequestContext, settings: Readonly<Settings>): RenderVariables {
    const fields = this.dependencies.fieldResolver.baseFields(ctx)
    const hostname = fields.get("hostname")
    const ip = ctx.clientIp

    return {
      domain: typeof hostname === "string" ? hostname : ctx.request.host,
      path: ctx.request.path,
      fingerprint: ctx.fingerprint,
      theme: settings.theme,
      language: settings.language,
      timestamp: formatTimestamp(ctx.receivedAt),
      client_ip: ip ? ` - IP: ${ip}` : "",
      client_user_agent: ctx.userAgent,
      captcha_type: settings.captchaType,
      hardness: settings.hardness,
      dataset: settings.dataset,
      without_watermark: settings.withoutWatermark,
      crawler_hints: settings.crawlerHints,
    }
  }
}
