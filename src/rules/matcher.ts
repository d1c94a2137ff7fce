import { isDeepStrictEqual } from "node:util"
import type { FieldMap, FieldValue } from "../types"
import type { AtomNode, Operator, RuleNode } from "./ast"

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/

/**
 * Equality with `*` wildcards. One `*` requires a prefix and a suffix; with
 * several, the text between the first and last `*` must also appear in the
 * value. Non-string operands fall back to strict equality.
 */
export function matchesAsterisk(value: FieldValue, pattern: FieldValue): boolean {
  if (typeof value !== "string" || typeof pattern !== "string" || !pattern.includes("*")) {
    return isDeepStrictEqual(value, pattern)
  }

  const first = pattern.indexOf("*")
  const last = pattern.lastIndexOf("*")
  const start = pattern.slice(0, first)
  const end = pattern.slice(last + 1)

  if (!value.startsWith(start) || !value.endsWith(end)) {
    return false
  }

  if (first === last) {
    return true
  }

  return value.includes(pattern.slice(first + 1, last))
}

export function matches(rule: RuleNode, fields: FieldMap): boolean {
  switch (rule.kind) {
    case "and":
      return matches(rule.left, fields) && matches(rule.right, fields)
    case "or":
      return matches(rule.left, fields) || matches(rule.right, fields)
    case "atom":
      return matchesAtom(rule, fields)
  }
}

function matchesAtom(atom: AtomNode, fields: FieldMap): boolean {
  const fieldData = fields.get(atom.field)
  if (fieldData === undefined || fieldData === null || atom.operator === null) {
    return false
  }

  try {
    return evaluateOperator(fieldData, atom.operator, atom.value)
  } catch {
    return false
  }
}

export function evaluateOperator(fieldData: FieldValue, operator: Operator, value: FieldValue): boolean {
  switch (operator) {
    case "equals":
      return matchesAsterisk(fieldData, value)
    case "notEquals":
      return !matchesAsterisk(fieldData, value)
    case "contains":
      return containment(fieldData, value) === true
    case "notContains":
      return containment(fieldData, value) === false
    case "in":
      return containment(value, fieldData) === true
    case "notIn":
      return containment(value, fieldData) === false
    case "greaterThan":
      return compareNumbers(fieldData, value, (left, right) => left > right)
    case "lessThan":
      return compareNumbers(fieldData, value, (left, right) => left < right)
    case "startsWith":
      return checkAffix(fieldData, value, (text, affix) => text.startsWith(affix))
    case "endsWith":
      return checkAffix(fieldData, value, (text, affix) => text.endsWith(affix))
  }
}

// null means the container cannot hold the needle; negated operators stay false then.
function containment(container: FieldValue, needle: FieldValue): boolean | null {
  if (typeof container === "string") {
    return typeof needle === "string" || typeof needle === "number"
      ? container.includes(String(needle))
      : null
  }

  if (Array.isArray(container)) {
    return container.some((item) => isDeepStrictEqual(item, needle))
  }

  if (container !== null && typeof container === "object") {
    return typeof needle === "string" ? Object.hasOwn(container, needle) : null
  }

  return null
}

function toNumber(value: FieldValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null
  }

  if (typeof value === "string" && NUMERIC_STRING.test(value.trim())) {
    return Number.parseFloat(value)
  }

  return null
}

function compareNumbers(
  fieldData: FieldValue,
  value: FieldValue,
  compare: (left: number, right: number) => boolean,
): boolean {
  const left = toNumber(fieldData)
  const right = toNumber(value)
  if (left === null || right === null) {
    return false
  }

  return compare(left, right)
}

function checkAffix(
  fieldData: FieldValue,
  value: FieldValue,
  check: (text: string, affix: string) => boolean,
): boolean {
  const text = typeof fieldData === "number" ? String(fieldData) : fieldData
  const affix = typeof value === "number" ? String(value) : value
  if (typeof text !== "string" || typeof affix !== "string") {
    return false
  }

  return check(text, affix)
}
