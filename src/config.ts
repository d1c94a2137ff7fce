import { z } from "zod"
import { ConfigurationError } from "./lib/errors"
import { buildDefaultSettings, type Settings } from "./settings"

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace"

export interface ReputationSettings {
  cacheTtlMs: number
  providerTimeoutMs: number
  exoneratorTimeoutMs: number
  dnsblZone: string
  ipintelContact: string
}

export interface AppConfig {
  port: number
  host: string
  upstreamMessage: string
  dbPath: string
  logDir: string
  logLevel: LogLevel
  retentionDays: number
  rulesPath: string | undefined
  geoipPath: string | undefined
  templatesDir: string | undefined
  fingerprintSecret: string
  reputation: ReputationSettings
  defaultSettings: Readonly<Settings>
}

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  PORTCULLIS_UPSTREAM_MESSAGE: z.string().default("Hello, World!"),
  PORTCULLIS_DB_PATH: z.string().default("./data/portcullis.db"),
  PORTCULLIS_LOG_DIR: z.string().default("./data/logs"),
  PORTCULLIS_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  PORTCULLIS_RETENTION_DAYS: z.string().optional(),
  PORTCULLIS_RULES_PATH: z.string().optional(),
  PORTCULLIS_GEOIP_PATH: z.string().optional(),
  PORTCULLIS_TEMPLATES_DIR: z.string().optional(),
  PORTCULLIS_DEFAULT_SETTINGS: z.string().optional(),
  PORTCULLIS_FINGERPRINT_SECRET: z.string().default("portcullis"),
  PORTCULLIS_REPUTATION_TTL_SECONDS: z.string().optional(),
  PORTCULLIS_PROVIDER_TIMEOUT_MS: z.string().optional(),
  PORTCULLIS_EXONERATOR_TIMEOUT_MS: z.string().optional(),
  PORTCULLIS_DNSBL_ZONE: z.string().default("dnsel.torproject.org"),
  PORTCULLIS_IPINTEL_CONTACT: z.string().default(""),
})

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function optionalPath(input: string | undefined): string | undefined {
  const trimmed = input?.trim()
  return trimmed ? trimmed : undefined
}

function parseDefaultSettings(input: string | undefined): Readonly<Settings> {
  if (!input?.trim()) {
    return buildDefaultSettings()
  }

  let overrides: unknown
  try {
    overrides = JSON.parse(input)
  } catch (error) {
    throw new ConfigurationError("PORTCULLIS_DEFAULT_SETTINGS is not valid JSON", error)
  }

  return buildDefaultSettings(overrides)
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError("Invalid environment", parsed.error.flatten())
  }

  const values = parsed.data

  return {
    port: toInteger(values.PORT, 3000),
    host: values.HOST ?? "0.0.0.0",
    upstreamMessage: values.PORTCULLIS_UPSTREAM_MESSAGE,
    dbPath: values.PORTCULLIS_DB_PATH,
    logDir: values.PORTCULLIS_LOG_DIR,
    logLevel: values.PORTCULLIS_LOG_LEVEL,
    retentionDays: toMinInteger(values.PORTCULLIS_RETENTION_DAYS, 30, 1),
    rulesPath: optionalPath(values.PORTCULLIS_RULES_PATH),
    geoipPath: optionalPath(values.PORTCULLIS_GEOIP_PATH),
    templatesDir: optionalPath(values.PORTCULLIS_TEMPLATES_DIR),
    fingerprintSecret: values.PORTCULLIS_FINGERPRINT_SECRET,
    reputation: {
      cacheTtlMs: toMinInteger(values.PORTCULLIS_REPUTATION_TTL_SECONDS, 28_800, 1) * 1000,
      providerTimeoutMs: toMinInteger(values.PORTCULLIS_PROVIDER_TIMEOUT_MS, 2_000, 1),
      exoneratorTimeoutMs: toMinInteger(values.PORTCULLIS_EXONERATOR_TIMEOUT_MS, 3_000, 1),
      dnsblZone: values.PORTCULLIS_DNSBL_ZONE.trim().replace(/^\.+|\.+$/g, ""),
      ipintelContact: values.PORTCULLIS_IPINTEL_CONTACT.trim(),
    },
    defaultSettings: parseDefaultSettings(values.PORTCULLIS_DEFAULT_SETTINGS),
  }
}
