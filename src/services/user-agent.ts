import { readFileSync } from "node:fs"
import { z } from "zod"

const MAX_USER_AGENT_LENGTH = 1024
const PRINTABLE_ASCII = /^[\x20-\x7e]+$/
// At least one product token such as "Mozilla/5.0" or "curl/8.4.0".
const PRODUCT_TOKEN = /(^|\s)[A-Za-z][\w.!#$%&'*+^`|~-]*\/[\w.+-]+/

const CrawlerListSchema = z.array(z.string().min(1))

export type UserAgentVerdict = "ok" | "empty" | "malformed" | "crawler"

export function loadCrawlerSignatures(
  path: URL | string = new URL("../../assets/crawlers.json", import.meta.url),
): string[] {
  const parsed = CrawlerListSchema.parse(JSON.parse(readFileSync(path, "utf8")))
  return parsed.map((signature) => signature.toLowerCase())
}

export class UserAgentInspector {
  constructor(private readonly crawlerSignatures: readonly string[]) {}

  isStructurallyValid(userAgent: string): boolean {
    return (
      userAgent.length <= MAX_USER_AGENT_LENGTH &&
      PRINTABLE_ASCII.test(userAgent) &&
      PRODUCT_TOKEN.test(userAgent)
    )
  }

  isCrawler(userAgent: string): boolean {
    const normalized = userAgent.toLowerCase()
    return this.crawlerSignatures.some((signature) => normalized.includes(signature))
  }

  inspect(userAgent: string, blockCrawlers: boolean): UserAgentVerdict {
    const trimmed = userAgent.trim()
    if (!trimmed) {
      return "empty"
    }

    if (!this.isStructurallyValid(trimmed)) {
      return "malformed"
    }

    if (blockCrawlers && this.isCrawler(trimmed)) {
      return "crawler"
    }

    return "ok"
  }
}
