import type { AppConfig } from "./config"
import { AuditDb } from "./db"
import { TtlCache } from "./lib/ttl-cache"
import { createLoggers, type Loggers } from "./logger"
import { loadRuleset, type Ruleset } from "./rules/ruleset"
import type { ServerContext } from "./server-context"
import { DecisionEngine } from "./services/decision-engine"
import { RequestEvaluator } from "./services/evaluator"
import { FieldResolver } from "./services/field-resolver"
import { StaticGeoIpProvider, type GeoIpProvider } from "./services/geoip"
import { SlidingWindowRateLimiter } from "./services/rate-limiter"
import { TemplateRenderer, type Renderer } from "./services/renderer"
import { ReputationAggregator, type DefiniteVerdict } from "./services/reputation/aggregator"
import { DnsblTorProvider, type Resolve4 } from "./services/reputation/dnsbl"
import { ExoneratorTorProvider } from "./services/reputation/exonerator"
import { GeoIpReputationProvider } from "./services/reputation/geoip-reputation"
import { IpApiProvider } from "./services/reputation/ip-api"
import { IpIntelProvider } from "./services/reputation/ipintel"
import type { FetchLike } from "./services/reputation/provider"
import { SettingsResolver } from "./services/settings-resolver"
import { UserAgentInspector, loadCrawlerSignatures } from "./services/user-agent"

/** Collaborators that tests and embedders may replace. */
export interface AppOverrides {
  loggers?: Loggers
  db?: AuditDb
  ruleset?: Ruleset
  geoProviders?: GeoIpProvider[]
  crawlerSignatures?: string[]
  renderer?: Renderer
  fetchImpl?: FetchLike
  resolve4?: Resolve4
  now?: () => number
}

export function createServerContext(config: AppConfig, overrides: AppOverrides = {}): ServerContext {
  const loggers = overrides.loggers ?? createLoggers(config)
  const db = overrides.db ?? new AuditDb(config.dbPath)
  const now = overrides.now ?? Date.now

  const ruleset = overrides.ruleset ?? loadRuleset(config.rulesPath)
  if (ruleset.unknownOperators.length > 0) {
    loggers.app.warn(
      { operators: ruleset.unknownOperators },
      "ruleset uses unknown operators; those conditions never match",
    )
  }

  const geoProviders =
    overrides.geoProviders ?? (config.geoipPath ? [StaticGeoIpProvider.fromFile("geoip", config.geoipPath)] : [])

  const { reputation } = config
  const aggregator = new ReputationAggregator(
    [
      new IpApiProvider({ fetchImpl: overrides.fetchImpl }),
      new IpIntelProvider(reputation.ipintelContact, { fetchImpl: overrides.fetchImpl }),
      new DnsblTorProvider(reputation.dnsblZone, {
        resolve4: overrides.resolve4,
        timeoutMs: reputation.providerTimeoutMs,
      }),
      new ExoneratorTorProvider({ fetchImpl: overrides.fetchImpl, now }),
      new GeoIpReputationProvider(geoProviders),
    ],
    {
      cache: new TtlCache<DefiniteVerdict>({ ttlMs: reputation.cacheTtlMs, now }),
      logger: loggers.app,
      timeoutMs: reputation.providerTimeoutMs,
      timeoutOverrides: { exonerator: reputation.exoneratorTimeoutMs },
      sink: (event) => {
        loggers.security.info(event, "reputation provider flagged address")
      },
    },
  )

  const fieldResolver = new FieldResolver({
    aggregator,
    geoProviders,
    providers: config.defaultSettings.providers,
    logger: loggers.app,
  })

  const engine = new DecisionEngine({
    aggregator,
    userAgents: new UserAgentInspector(overrides.crawlerSignatures ?? loadCrawlerSignatures()),
    rateLimiter: new SlidingWindowRateLimiter({ now }),
    auditSink: db,
    logger: loggers.app,
  })

  const evaluator = new RequestEvaluator({
    fieldResolver,
    settingsResolver: new SettingsResolver(config.defaultSettings, ruleset, fieldResolver),
    engine,
    loggers,
    fingerprintSecret: config.fingerprintSecret,
    now: () => new Date(now()),
  })

  return {
    config,
    db,
    loggers,
    evaluator,
    renderer: overrides.renderer ?? new TemplateRenderer(config.templatesDir),
  }
}
