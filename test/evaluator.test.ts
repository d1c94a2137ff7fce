import { describe, expect, test } from "vitest"
import { createServerContext } from "../src/app"
import { loadConfig } from "../src/config"
import { AuditDb } from "../src/db"
import { createSilentLoggers } from "../src/logger"
import { compileRuleset } from "../src/rules/ruleset"
import { handleGate } from "../src/routes/gate"
import type { ServerContext } from "../src/server-context"
import { TtlCache } from "../src/lib/ttl-cache"
import { DEFAULT_SETTINGS } from "../src/settings"
import { DecisionEngine } from "../src/services/decision-engine"
import { RequestEvaluator, formatTimestamp } from "../src/services/evaluator"
import { FieldResolver } from "../src/services/field-resolver"
import { SlidingWindowRateLimiter } from "../src/services/rate-limiter"
import { ReputationAggregator, type DefiniteVerdict } from "../src/services/reputation/aggregator"
import { SettingsResolver } from "../src/services/settings-resolver"
import { UserAgentInspector } from "../src/services/user-agent"
import { BROWSER_UA, MemoryAuditSink, jsonFetchResponse, makeRequest, textFetchResponse } from "./helpers"

const NOW = Date.UTC(2024, 0, 1, 0, 0, 0)

interface Stubs {
  fetchUrls: string[]
  dnsQueries: string[]
}

function createContext(
  options: { rules?: unknown; ipApi?: Record<string, unknown> } = {},
): { ctx: ServerContext; stubs: Stubs } {
  const stubs: Stubs = { fetchUrls: [], dnsQueries: [] }
  const ctx = createServerContext(loadConfig({ PORTCULLIS_FINGERPRINT_SECRET: "test-secret" }), {
    loggers: createSilentLoggers(),
    db: new AuditDb(":memory:"),
    ruleset: compileRuleset(options.rules ?? []),
    geoProviders: [],
    crawlerSignatures: ["googlebot"],
    now: () => NOW,
    fetchImpl: async (input) => {
      const url = String(input)
      stubs.fetchUrls.push(url)
      if (url.includes("ip-api.com")) {
        return jsonFetchResponse(options.ipApi ?? { status: "success", proxy: false, hosting: false })
      }
      return textFetchResponse("<html>Result is negative</html>")
    },
    resolve4: async (hostname) => {
      stubs.dnsQueries.push(hostname)
      throw Object.assign(new Error("queryA ENOTFOUND"), { code: "ENOTFOUND" })
    },
  })
  return { ctx, stubs }
}

describe("request evaluator", () => {
  test("formats timestamps in UTC", () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 4, 6, 7, 8, 9)))).toBe("2024-05-06 07:08:09 UTC")
  })

  test("an allow rule on / never touches reputation providers", async () => {
    const { ctx, stubs } = createContext({ rules: [{ when: ["path", "==", "/"], set: { action: "allow" } }] })

    const decision = await ctx.evaluator.evaluate(makeRequest())

    expect(decision.action).toBe("allow")
    expect(decision.status).toBe(200)
    expect(stubs.fetchUrls).toEqual([])
    expect(stubs.dnsQueries).toEqual([])
  })

  test("clean requests run every provider and are audited", async () => {
    const { ctx, stubs } = createContext()

    const decision = await ctx.evaluator.evaluate(makeRequest())

    expect(decision).toMatchObject({ action: "allow", status: 200, reason: "No risk signals" })
    expect(stubs.fetchUrls).toEqual([
      "http://ip-api.com/json/1.2.3.4?fields=status,proxy,hosting,isp,org,as",
      "https://metrics.torproject.org/exonerator.html?ip=1.2.3.4&timestamp=2023-12-30&lang=en",
    ])
    expect(stubs.dnsQueries).toEqual(["4.3.2.1.dnsel.torproject.org"])

    const entries = ctx.db.listByFingerprint(String(decision.variables.fingerprint))
    expect(entries).toEqual([
      {
        fingerprint: decision.variables.fingerprint,
        timestamp: NOW / 1000,
        ip: "1.2.3.4",
        userAgent: BROWSER_UA,
        httpVersion: "HTTP/1.1",
        action: "allow",
      },
    ])
  })

  test("hosting addresses are challenged with the page variables filled in", async () => {
    const { ctx } = createContext({ ipApi: { status: "success", proxy: false, hosting: true } })

    const decision = await ctx.evaluator.evaluate(makeRequest())

    expect(decision.action).toBe("challenge")
    expect(decision.status).toBe(429)
    expect(decision.reason).toBe("Client IP is classified as malicious")
    expect(decision.variables).toEqual({
      domain: "www.example.com",
      path: "/",
      fingerprint: decision.variables.fingerprint,
      theme: "light",
      language: "en",
      timestamp: "2024-01-01 00:00:00 UTC",
      client_ip: " - IP: 1.2.3.4",
      client_user_agent: BROWSER_UA,
      captcha_type: "oneclick",
      hardness: 1,
      dataset: "keys",
      without_watermark: false,
      crawler_hints: true,
    })
    expect(String(decision.variables.fingerprint)).toMatch(/^[0-9A-Za-z]{11}=====$/)
  })

  test("rule overrides reach the render variables", async () => {
    const { ctx } = createContext({
      rules: [{ when: ["path", "startswith", "/admin"], set: { action: "block", theme: "dark" } }],
    })

    const decision = await ctx.evaluator.evaluate(makeRequest({ path: "/admin/users", remoteAddress: "10.0.0.5" }))

    expect(decision.status).toBe(403)
    expect(decision.variables.theme).toBe("dark")
    expect(decision.variables.client_ip).toBe("")
  })

  test("rule-level providers replace the ones the rule fields were resolved with", async () => {
    const { ctx, stubs } = createContext({
      rules: [{ when: ["is_ip_malicious", "==", true], set: { providers: ["dnsbl"] } }],
      ipApi: { status: "success", proxy: false, hosting: true },
    })

    const decision = await ctx.evaluator.evaluate(makeRequest())

    expect(decision).toMatchObject({ action: "allow", reason: "No risk signals" })
    expect(stubs.fetchUrls).toEqual(["http://ip-api.com/json/1.2.3.4?fields=status,proxy,hosting,isp,org,as"])
    expect(stubs.dnsQueries).toEqual(["4.3.2.1.dnsel.torproject.org"])
  })

  test("falls back to the defaults when settings cannot be resolved", async () => {
    class FailingSettingsResolver extends SettingsResolver {
      override async settingsFor(): Promise<never> {
        throw new Error("rule evaluation exploded")
      }
    }

    const loggers = createSilentLoggers()
    const aggregator = new ReputationAggregator([], {
      cache: new TtlCache<DefiniteVerdict>({ ttlMs: 1_000 }),
      logger: loggers.app,
      timeoutMs: 1_000,
    })
    const fieldResolver = new FieldResolver({ aggregator, geoProviders: [], providers: [], logger: loggers.app })
    const audit = new MemoryAuditSink()
    const evaluator = new RequestEvaluator({
      fieldResolver,
      settingsResolver: new FailingSettingsResolver(DEFAULT_SETTINGS, compileRuleset([]), fieldResolver),
      engine: new DecisionEngine({
        aggregator,
        userAgents: new UserAgentInspector([]),
        rateLimiter: new SlidingWindowRateLimiter(),
        auditSink: audit,
        logger: loggers.app,
      }),
      loggers,
      fingerprintSecret: "test-secret",
    })

    const decision = await evaluator.evaluate(makeRequest({ headers: {} }))

    expect(decision.action).toBe("challenge")
    expect(decision.reason).toBe("User agent is empty")
    expect(audit.entries).toHaveLength(1)
  })
})

describe("gate route", () => {
  test("allowed requests get the upstream response", async () => {
    const { ctx } = createContext({ rules: [{ when: ["path", "==", "/"], set: { action: "allow" } }] })

    const response = await handleGate(makeRequest(), ctx)

    expect(response.status).toBe(200)
    expect(response.body).toBe("Hello, World!")
  })

  test("blocked requests get the rendered access denied page", async () => {
    const { ctx } = createContext({ rules: [{ when: ["path", "==", "/"], set: { action: "block" } }] })

    const response = await handleGate(makeRequest(), ctx)

    expect(response.status).toBe(403)
    expect(response.headers["x-portcullis-action"]).toBe("block")
    expect(response.headers["content-type"]).toBe("text/html; charset=utf-8")
    expect(response.body).toContain("<title>Access denied - www.example.com</title>")
    expect(response.body).toContain("Protected by portcullis")
  })

  test("challenged requests get the challenge page", async () => {
    const { ctx } = createContext({
      rules: [{ when: ["path", "==", "/"], set: { action: "fight", captchaType: "audio", withoutWatermark: true } }],
    })

    const response = await handleGate(makeRequest(), ctx)

    expect(response.status).toBe(429)
    expect(response.body).toContain('data-captcha-type="audio"')
    expect(response.body).not.toContain("Protected by portcullis")
  })
})
