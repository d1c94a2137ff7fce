import { isPublicIp, normalizeIp } from "./network"

// Checked in order; each header is also tried with a "-v6" suffix.
const CLIENT_IP_HEADERS = [
  "cf-connecting-ip",
  "x-real-ip",
  "x-forwarded-for",
  "x-cluster-client-ip",
  "x-forwarded",
  "true-client-ip",
  "x-appengine-user-ip",
]

export function candidateAddresses(
  headers: Record<string, string | undefined>,
  remoteAddress: string | null,
): string[] {
  const candidates: string[] = []

  for (const header of CLIENT_IP_HEADERS) {
    for (const name of [header, `${header}-v6`]) {
      const raw = headers[name]
      if (!raw) {
        continue
      }

      // x-forwarded-for style lists carry the original client first.
      const first = raw.split(",")[0]?.trim()
      if (first) {
        candidates.push(first)
      }
    }
  }

  if (remoteAddress) {
    candidates.push(remoteAddress)
  }

  return candidates
}

/** First candidate that is a valid public address, or null. */
export function resolveClientIp(
  headers: Record<string, string | undefined>,
  remoteAddress: string | null,
): string | null {
  for (const candidate of candidateAddresses(headers, remoteAddress)) {
    const normalized = normalizeIp(candidate)
    if (normalized && isPublicIp(normalized)) {
      return normalized
    }
  }

  return null
}
