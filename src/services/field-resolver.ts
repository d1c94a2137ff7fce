import type pino from "pino"
import { normalizeIp } from "../lib/network"
import type { RequestContext } from "../request-context"
import type { ProviderName } from "../settings"
import type { FieldMap, FieldValue, InboundRequest } from "../types"
import type { GeoIpProvider, GeoIpRecord } from "./geoip"
import type { ReputationAggregator } from "./reputation/aggregator"

export const BASE_FIELDS = [
  "method",
  "host",
  "netloc",
  "hostname",
  "domain",
  "subdomain",
  "path",
  "scheme",
  "args",
  "is_json",
  "json",
  "url",
  "ip",
  "user_agent",
  "http_version",
] as const

export interface FieldResolverOptions {
  aggregator: ReputationAggregator
  geoProviders: readonly GeoIpProvider[]
  // Reputation providers used for is_ip_malicious / is_ip_tor, before any rule has applied.
  providers: readonly ProviderName[]
  logger: pino.Logger
}

export function hostnameOf(host: string): string {
  const trimmed = host.trim().toLowerCase()
  if (trimmed.startsWith("[")) {
    const end = trimmed.indexOf("]")
    return end === -1 ? trimmed.slice(1) : trimmed.slice(1, end)
  }

  const colon = trimmed.indexOf(":")
  // More than one colon without brackets is a bare IPv6 literal.
  if (colon !== -1 && trimmed.indexOf(":", colon + 1) === -1) {
    return trimmed.slice(0, colon)
  }

  return trimmed
}

export function splitDomain(hostname: string): { domain: string; subdomain: string } {
  if (normalizeIp(hostname)) {
    return { domain: hostname, subdomain: "" }
  }

  const labels = hostname.split(".").filter(Boolean)
  if (labels.length <= 2) {
    return { domain: labels.join("."), subdomain: "" }
  }

  return {
    domain: labels.slice(-2).join("."),
    subdomain: labels.slice(0, -2).join("."),
  }
}

export function resolveScheme(request: InboundRequest): string {
  const forwarded = request.headers["x-forwarded-proto"]?.split(",")[0]?.trim().toLowerCase()
  if (forwarded === "http" || forwarded === "https") {
    return forwarded
  }
  return request.scheme
}

export function isJsonRequest(request: InboundRequest): boolean {
  const contentType = request.headers["content-type"]?.toLowerCase() ?? ""
  return contentType.includes("application/json") || contentType.includes("+json")
}

/** Narrows an arbitrary parsed value to a FieldValue, or null when it is not one. */
export function toFieldValue(input: unknown): FieldValue | null {
  if (input === null || typeof input === "string" || typeof input === "boolean") {
    return input
  }

  if (typeof input === "number") {
    return Number.isFinite(input) ? input : null
  }

  if (Array.isArray(input)) {
    return input.map((item) => toFieldValue(item))
  }

  if (typeof input === "object") {
    const output: { [key: string]: FieldValue } = {}
    for (const [key, value] of Object.entries(input)) {
      output[key] = toFieldValue(value)
    }
    return output
  }

  return null
}

/**
 * Builds the field map rules are matched against. Base fields come straight
 * from the request; reputation flags and GeoIP attributes are resolved only
 * when a rule names them, once per request.
 */
export class FieldResolver {
  constructor(private readonly options: FieldResolverOptions) {}

  baseFields(ctx: RequestContext): FieldMap {
    if (ctx.fields.has("method")) {
      return ctx.fields
    }

    const { request } = ctx
    const hostname = hostnameOf(request.host)
    const { domain, subdomain } = splitDomain(hostname)
    const isJson = isJsonRequest(request)

    const base: Record<(typeof BASE_FIELDS)[number], FieldValue> = {
      method: request.method.toUpperCase(),
      host: request.host,
      netloc: netlocOf(request.url, request.host),
      hostname,
      domain,
      subdomain,
      path: request.path,
      scheme: resolveScheme(request),
      args: { ...request.query },
      is_json: isJson,
      json: isJson ? toFieldValue(request.body) : null,
      url: request.url,
      ip: ctx.clientIp,
      user_agent: ctx.userAgent,
      http_version: request.httpVersion,
    }

    for (const name of BASE_FIELDS) {
      ctx.fields.set(name, base[name])
    }

    return ctx.fields
  }

  async resolve(ctx: RequestContext, fieldsNeeded: Iterable<string>): Promise<FieldMap> {
    const fields = this.baseFields(ctx)

    for (const field of fieldsNeeded) {
      if (fields.has(field) || ctx.attemptedFields.has(field)) {
        continue
      }

      ctx.attemptedFields.add(field)
      const value = await this.resolveExtra(ctx, field)
      if (value !== undefined) {
        fields.set(field, value)
      }
    }

    return fields
  }

  private async resolveExtra(ctx: RequestContext, field: string): Promise<FieldValue | undefined> {
    const ip = ctx.clientIp

    if (field === "is_ip_malicious" || field === "is_ip_tor") {
      if (!ip) {
        return false
      }

      const kind = field === "is_ip_malicious" ? "malicious" : "tor"
      return this.options.aggregator.classify(ip, this.options.providers, kind)
    }

    if (!ip) {
      return undefined
    }

    for (const provider of this.options.geoProviders) {
      if (!provider.fields.has(field)) {
        continue
      }

      const record = await this.lookupOnce(ctx, provider, ip)
      const value = record?.[field]
      if (value !== undefined) {
        return value
      }
    }

    return undefined
  }

  private lookupOnce(ctx: RequestContext, provider: GeoIpProvider, ip: string): Promise<GeoIpRecord | null> {
    const existing = ctx.geoLookups.get(provider.name)
    if (existing) {
      return existing
    }

    const lookup = provider.lookup(ip).catch((error: unknown) => {
      this.options.logger.warn(
        { provider: provider.name, error: error instanceof Error ? error.message : String(error) },
        "geoip lookup failed",
      )
      return null
    })

    ctx.geoLookups.set(provider.name, lookup)
    return lookup
  }
}

function netlocOf(url: string, fallback: string): string {
  try {
    return new URL(url).host
  } catch {
    return fallback
  }
}
