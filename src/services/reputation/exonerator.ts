import { ProviderError } from "../../lib/errors"
import type { ReputationKind } from "../../types"
import type { FetchLike, ProviderResult, ReputationProvider } from "./provider"

export const POSITIVE_MARKER = "Result is positive"

const DAY_MS = 24 * 60 * 60 * 1000

interface ExoneratorDependencies {
  fetchImpl?: FetchLike
  baseUrl?: string
  now?: () => number
}

/**
 * ExoneraTor lookup for any address family. The page is read chunk by chunk
 * and the read stops as soon as the positive marker shows up.
 */
export class ExoneratorTorProvider implements ReputationProvider {
  readonly id = "exonerator" as const
  readonly kinds: readonly ReputationKind[] = ["tor"]

  private readonly fetchImpl: FetchLike
  private readonly baseUrl: string
  private readonly now: () => number

  constructor(dependencies: ExoneratorDependencies = {}) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.baseUrl = dependencies.baseUrl ?? "https://metrics.torproject.org/exonerator.html"
    this.now = dependencies.now ?? Date.now
  }

  lookupUrl(ip: string): string {
    // Relay lists lag behind, so ask about two days ago.
    const timestamp = new Date(this.now() - 2 * DAY_MS).toISOString().slice(0, 10)
    const query = new URLSearchParams({ ip, timestamp, lang: "en" })
    return `${this.baseUrl}?${query.toString()}`
  }

  async check(ip: string, signal: AbortSignal): Promise<ProviderResult> {
    const response = await this.fetchImpl(this.lookupUrl(ip), {
      method: "GET",
      headers: { Range: "bytes=0-" },
      signal,
    })

    if (!response.ok) {
      throw new ProviderError(this.id, `returned ${response.status}`)
    }

    if (!response.body) {
      throw new ProviderError(this.id, "response has no body")
    }

    const found = await streamContains(response.body, POSITIVE_MARKER)
    return { verdict: found.matched ? "flagged" : "clean", raw: { bytesRead: found.bytesRead } }
  }
}

/**
 * Scans a byte stream for `marker` without buffering the whole body. Only a
 * tail as long as the marker is carried between chunks, and the stream is
 * cancelled on the first hit.
 */
export async function streamContains(
  body: ReadableStream<Uint8Array>,
  marker: string,
): Promise<{ matched: boolean; bytesRead: number }> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let carry = ""
  let bytesRead = 0

  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) {
        carry += decoder.decode()
        return { matched: carry.includes(marker), bytesRead }
      }

      bytesRead += value.byteLength
      const window = carry + decoder.decode(value, { stream: true })
      if (window.includes(marker)) {
        await reader.cancel()
        return { matched: true, bytesRead }
      }

      carry = window.slice(-(marker.length - 1))
    }
  } finally {
    reader.releaseLock()
  }
}
