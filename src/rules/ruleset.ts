import { readFileSync } from "node:fs"
import { z } from "zod"
import { ConfigurationError } from "../lib/errors"
import { SettingsOverrideSchema, type SettingsOverride } from "../settings"
import type { FieldValue } from "../types"
import { collectFields, collectUnknownOperators, parseRule, type RuleNode, type RuleToken } from "./ast"

export interface CompiledRule {
  source: readonly RuleToken[]
  node: RuleNode
  set: Readonly<SettingsOverride>
}

export interface Ruleset {
  rules: readonly CompiledRule[]
  // Every field referenced by any rule, resolved up front for each request.
  fields: ReadonlySet<string>
  unknownOperators: readonly string[]
}

const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(FieldValueSchema),
    z.record(FieldValueSchema),
  ]),
)

const RuleEntrySchema = z.object({
  when: z.array(FieldValueSchema).min(3),
  set: SettingsOverrideSchema,
})

const RulesetSchema = z.array(RuleEntrySchema)

export function compileRuleset(input: unknown): Ruleset {
  const parsed = RulesetSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError("Invalid ruleset", parsed.error.flatten())
  }

  const fields = new Set<string>()
  const unknownOperators: string[] = []
  const rules = parsed.data.map((entry, index): CompiledRule => {
    let node: RuleNode
    try {
      node = parseRule(entry.when)
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`Rule #${index + 1}: ${error.message}`, error.details)
      }
      throw error
    }

    collectFields(node, fields)
    collectUnknownOperators(node, unknownOperators)

    return {
      source: Object.freeze([...entry.when]),
      node,
      set: Object.freeze({ ...entry.set }),
    }
  })

  return { rules, fields, unknownOperators }
}

export function loadRuleset(path: string | undefined): Ruleset {
  if (!path) {
    return compileRuleset([])
  }

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, "utf8"))
  } catch (error) {
    throw new ConfigurationError(`Could not read ruleset from ${path}`, error)
  }

  return compileRuleset(raw)
}
