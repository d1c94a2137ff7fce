import { z } from "zod"
import { ConfigurationError } from "./lib/errors"

export const PROVIDER_NAMES = ["ipapi", "ipintel", "dnsbl", "exonerator", "geoip"] as const
export type ProviderName = (typeof PROVIDER_NAMES)[number]

export const ACTIONS = ["auto", "allow", "block", "fight", "block_if_suspicious"] as const
export type SettingsAction = (typeof ACTIONS)[number]

const positiveInt = z.number().int().positive()

export const SettingsSchema = z
  .object({
    action: z.enum(ACTIONS),
    captchaType: z.enum(["oneclick", "text", "audio"]),
    hardness: z.number().int().min(1).max(3),
    verificationAge: positiveInt,
    dataset: z.enum(["keys", "animals"]),
    datasetSize: z.tuple([positiveInt, positiveInt]).readonly(),
    enableRateLimit: z.boolean(),
    rateLimit: z.tuple([positiveInt, positiveInt]).readonly(),
    enableCrawlerBlock: z.boolean(),
    crawlerHints: z.boolean(),
    theme: z.enum(["light", "dark"]),
    language: z.string().regex(/^[a-z]{2}$/),
    withoutWatermark: z.boolean(),
    providers: z.array(z.enum(PROVIDER_NAMES)).readonly(),
  })
  .strict()

export type Settings = z.infer<typeof SettingsSchema>

export const SettingsOverrideSchema = SettingsSchema.partial().strict()

export type SettingsOverride = z.infer<typeof SettingsOverrideSchema>

const builtinDefaults: Settings = {
  action: "auto",
  captchaType: "oneclick",
  hardness: 1,
  verificationAge: 3600,
  dataset: "keys",
  datasetSize: Object.freeze([20, 100] as const),
  enableRateLimit: false,
  rateLimit: Object.freeze([15, 300] as const),
  enableCrawlerBlock: false,
  crawlerHints: true,
  theme: "light",
  language: "en",
  withoutWatermark: false,
  providers: Object.freeze([...PROVIDER_NAMES]),
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze(builtinDefaults)

/**
 * Builds the base settings every request starts from. Overrides coming from
 * the environment are merged onto the built-in defaults and the result must
 * satisfy the full schema, so a bad key fails at startup instead of per request.
 */
export function buildDefaultSettings(overrides: unknown = {}): Readonly<Settings> {
  const partial = SettingsOverrideSchema.safeParse(overrides)
  if (!partial.success) {
    throw new ConfigurationError("Invalid default settings", partial.error.flatten())
  }

  const merged = SettingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...partial.data })
  if (!merged.success) {
    throw new ConfigurationError("Invalid default settings", merged.error.flatten())
  }

  return Object.freeze(merged.data)
}
