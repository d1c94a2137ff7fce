import { describe, expect, test } from "vitest"
import { TemplateRenderer, escapeHtml, renderTemplate } from "../src/services/renderer"

describe("template rendering", () => {
  test("fills placeholders and escapes markup", () => {
    expect(renderTemplate("<p>{client_user_agent}</p>", { client_user_agent: '<script>"x"</script>' })).toBe(
      "<p>&lt;script&gt;&quot;x&quot;&lt;/script&gt;</p>",
    )
  })

  test("placeholder names are case-insensitive and unknown ones stay", () => {
    expect(renderTemplate("{DOMAIN} {unknown}", { domain: "example.com" })).toBe("example.com {unknown}")
  })

  test("conditional blocks follow the variable", () => {
    const template = "{if crawler_hints}hint{endif}|{if not without_watermark}mark{endif}"

    expect(renderTemplate(template, { crawler_hints: true, without_watermark: false })).toBe("hint|mark")
    expect(renderTemplate(template, { crawler_hints: false, without_watermark: true })).toBe("|")
  })

  test("escapes quotes and ampersands", () => {
    expect(escapeHtml(`a & 'b'`)).toBe("a &amp; &#39;b&#39;")
  })

  test("loads the bundled templates", () => {
    const html = new TemplateRenderer().render("challenge", {
      domain: "example.com",
      path: "/login",
      fingerprint: "AbCdEfGhIjK=====",
      theme: "dark",
      language: "de",
      timestamp: "2024-01-01 00:00:00 UTC",
      client_ip: " - IP: 1.2.3.4",
      client_user_agent: "curl/8.4.0",
      captcha_type: "text",
      hardness: 2,
      dataset: "animals",
      without_watermark: false,
      crawler_hints: true,
    })

    expect(html).toContain('<html lang="de" data-theme="dark">')
    expect(html).toContain('<meta name="robots" content="noindex, nofollow">')
    expect(html).toContain("Reference: AbCdEfGhIjK===== - 2024-01-01 00:00:00 UTC - IP: 1.2.3.4")
    expect(html).toContain('data-captcha-type="text" data-hardness="2" data-dataset="animals"')
  })

  test("missing templates are a configuration error", () => {
    expect(() => new TemplateRenderer("/nonexistent-templates").render("access_denied", {})).toThrow(
      "Could not read template",
    )
  })
})
