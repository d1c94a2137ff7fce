import { ConfigurationError } from "../lib/errors"
import type { FieldValue } from "../types"

export type Operator =
  | "equals"
  | "notEquals"
  | "contains"
  | "notContains"
  | "in"
  | "notIn"
  | "greaterThan"
  | "lessThan"
  | "startsWith"
  | "endsWith"

export interface AtomNode {
  kind: "atom"
  field: string
  // null when the operator is not recognized; such atoms never match.
  operator: Operator | null
  rawOperator: string
  value: FieldValue
}

export interface AndNode {
  kind: "and"
  left: RuleNode
  right: RuleNode
}

export interface OrNode {
  kind: "or"
  left: RuleNode
  right: RuleNode
}

export type RuleNode = AtomNode | AndNode | OrNode

export type RuleToken = FieldValue

const OPERATOR_SYNONYMS: ReadonlyArray<readonly [Operator, readonly string[]]> = [
  ["equals", ["==", "=", "equals", "equal", "is", "isthesameas"]],
  ["notEquals", ["!=", "doesnotequal", "doesnotequals", "notequals", "notequal", "notis", "isnot"]],
  ["contains", ["contains", "contain"]],
  ["notContains", ["doesnotcontain", "doesnotcontains", "notcontain", "notcontains"]],
  ["in", ["isin", "in"]],
  ["notIn", ["isnotin", "notisin", "notin"]],
  ["greaterThan", [">", "greaterthan", "largerthan"]],
  ["lessThan", ["<", "lessthan", "smallerthan"]],
  ["startsWith", ["startswith", "beginswith"]],
  ["endsWith", ["endswith", "concludeswith", "finisheswith"]],
]

const OPERATOR_LOOKUP = new Map<string, Operator>(
  OPERATOR_SYNONYMS.flatMap(([operator, synonyms]) =>
    synonyms.map((synonym): [string, Operator] => [synonym, operator]),
  ),
)

export function normalizeOperator(raw: string): Operator | null {
  const normalized = raw.trim().toLowerCase().replace(/[\s_-]+/g, "")
  return OPERATOR_LOOKUP.get(normalized) ?? null
}

function connectiveOf(token: RuleToken | undefined): "and" | "or" | null {
  if (typeof token !== "string") {
    return null
  }

  const normalized = token.trim().toLowerCase()
  return normalized === "and" || normalized === "or" ? normalized : null
}

/**
 * Parses a flat token sequence such as
 * `["path", "startswith", "/admin", "and", "ip", "notin", ["10.0.0.1"]]`.
 *
 * The first connective splits the sequence and both halves are parsed
 * recursively, so evaluation is strictly left to right with no precedence:
 * `A and B or C` becomes `A and (B or C)`. Connectives are only recognized
 * between atoms, which lets a literal value be the string "and".
 */
export function parseRule(tokens: readonly RuleToken[]): RuleNode {
  if (tokens.length < 3) {
    throw new ConfigurationError(`Rule needs at least three tokens, got ${tokens.length}`, tokens)
  }

  const atom = parseAtom(tokens.slice(0, 3))
  if (tokens.length === 3) {
    return atom
  }

  const connective = connectiveOf(tokens[3])
  if (!connective) {
    throw new ConfigurationError(`Expected "and" or "or" after atom, got ${JSON.stringify(tokens[3])}`, tokens)
  }

  return {
    kind: connective,
    left: atom,
    right: parseRule(tokens.slice(4)),
  }
}

function parseAtom(tokens: readonly RuleToken[]): AtomNode {
  const [field, operator, value] = tokens
  if (typeof field !== "string" || field.trim().length === 0) {
    throw new ConfigurationError(`Rule field must be a non-empty string, got ${JSON.stringify(field)}`, tokens)
  }

  if (typeof operator !== "string") {
    throw new ConfigurationError(`Rule operator must be a string, got ${JSON.stringify(operator)}`, tokens)
  }

  return {
    kind: "atom",
    field: field.trim(),
    operator: normalizeOperator(operator),
    rawOperator: operator,
    value: value ?? null,
  }
}

export function collectFields(node: RuleNode, into: Set<string> = new Set()): Set<string> {
  if (node.kind === "atom") {
    into.add(node.field)
    return into
  }

  collectFields(node.left, into)
  collectFields(node.right, into)
  return into
}

export function collectUnknownOperators(node: RuleNode, into: string[] = []): string[] {
  if (node.kind === "atom") {
    if (node.operator === null) {
      into.push(node.rawOperator)
    }
    return into
  }

  collectUnknownOperators(node.left, into)
  collectUnknownOperators(node.right, into)
  return into
}
