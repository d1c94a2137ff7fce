import type { RequestContext } from "../request-context"
import { matches } from "../rules/matcher"
import type { Ruleset } from "../rules/ruleset"
import type { Settings } from "../settings"
import type { FieldMap } from "../types"
import type { FieldResolver } from "./field-resolver"

/**
 * Overlays the override of every matching rule onto the defaults, in rule
 * order, so a later match wins on a shared key.
 */
export function resolveSettings(defaults: Readonly<Settings>, ruleset: Ruleset, fields: FieldMap): Readonly<Settings> {
  let settings: Settings = { ...defaults }

  for (const rule of ruleset.rules) {
    if (matches(rule.node, fields)) {
      settings = { ...settings, ...rule.set }
    }
  }

  return Object.freeze(settings)
}

export class SettingsResolver {
  constructor(
    private readonly defaults: Readonly<Settings>,
    private readonly ruleset: Ruleset,
    private readonly fieldResolver: FieldResolver,
  ) {}

  get defaultSettings(): Readonly<Settings> {
    return this.defaults
  }

  /** Settings snapshot for the request; the first call's result is reused. */
  async settingsFor(ctx: RequestContext): Promise<Readonly<Settings>> {
    if (ctx.settings) {
      return ctx.settings
    }

    const fields = await this.fieldResolver.resolve(ctx, this.ruleset.fields)
    // Another caller may have finished first while the fields were resolving.
    if (ctx.settings) {
      return ctx.settings
    }

    ctx.settings = resolveSettings(this.defaults, this.ruleset, fields)
    return ctx.settings
  }
}
