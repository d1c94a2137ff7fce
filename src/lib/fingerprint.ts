import { createHash, createHmac } from "node:crypto"

const BASE62_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz"
const ITERATIONS = 1000
const HASH_LENGTH = 11
const FINGERPRINT_LENGTH = 16

export function toBase62(bytes: Uint8Array): string {
  let value = 0n
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte)
  }

  if (value === 0n) {
    return "0"
  }

  let encoded = ""
  while (value > 0n) {
    encoded = BASE62_ALPHABET.charAt(Number(value % 62n)) + encoded
    value /= 62n
  }

  return encoded
}

/**
 * Stable, one-way client identifier ("beam id") used to correlate audit
 * entries without keying them by the raw address or user agent.
 */
export function computeFingerprint(ip: string | null, userAgent: string, secret: string): string {
  let digest = createHmac("sha256", secret)
    .update(`${ip ?? ""}${userAgent}`)
    .digest()

  for (let round = 1; round < ITERATIONS; round += 1) {
    digest = createHash("sha256").update(digest).digest()
  }

  return toBase62(digest).slice(0, HASH_LENGTH).padEnd(FINGERPRINT_LENGTH, "=")
}
