import { readFileSync } from "node:fs"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import { ConfigurationError } from "../lib/errors"
import type { RenderVariables } from "../types"

export type TemplateId = "access_denied" | "challenge"

export interface Renderer {
  render(templateId: TemplateId, variables: RenderVariables): string
}

const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL("../../assets/templates", import.meta.url))

const CONDITIONAL = /\{if (not )?([a-z_]+)\}([\s\S]*?)\{endif\}/gi
const PLACEHOLDER = /\{([a-z_]+)\}/gi

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
}

function isTruthy(value: string | number | boolean | undefined): boolean {
  return value !== undefined && value !== false && value !== "" && value !== 0
}

/**
 * Fills `{name}` placeholders (HTML-escaped) and keeps `{if name}...{endif}`
 * blocks only when the variable is truthy; `{if not name}` inverts that.
 * Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, variables: RenderVariables): string {
  const lookup = (name: string) => variables[name.toLowerCase()]

  return template
    .replace(CONDITIONAL, (_match, negate: string | undefined, name: string, body: string) =>
      isTruthy(lookup(name)) !== Boolean(negate) ? body : "",
    )
    .replace(PLACEHOLDER, (match, name: string) => {
      const value = lookup(name)
      return value === undefined ? match : escapeHtml(String(value))
    })
}

export class TemplateRenderer implements Renderer {
  private readonly templates = new Map<TemplateId, string>()

  constructor(private readonly templatesDir: string = DEFAULT_TEMPLATES_DIR) {}

  render(templateId: TemplateId, variables: RenderVariables): string {
    return renderTemplate(this.load(templateId), variables)
  }

  private load(templateId: TemplateId): string {
    const cached = this.templates.get(templateId)
    if (cached !== undefined) {
      return cached
    }

    const path = join(this.templatesDir, `${templateId}.html`)
    let template: string
    try {
      template = readFileSync(path, "utf8")
    } catch (error) {
      throw new ConfigurationError(`Could not read template ${path}`, error)
    }

    this.templates.set(templateId, template)
    return template
  }
}
