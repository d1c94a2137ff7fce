import { isIP } from "node:net"

export interface CidrRange {
  family: 4 | 6
  network: bigint
  prefix: number
  mask: bigint
}

export interface ParsedIp {
  family: 4 | 6
  value: bigint
  ipv4Mapped: bigint | null
}

const RESERVED_IPV4_CIDRS = [
  "0.0.0.0/8",
  "10.0.0.0/8",
  "100.64.0.0/10",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "172.16.0.0/12",
  "192.0.0.0/24",
  "192.0.2.0/24",
  "192.88.99.0/24",
  "192.168.0.0/16",
  "198.18.0.0/15",
  "198.51.100.0/24",
  "203.0.113.0/24",
  "224.0.0.0/4",
  "240.0.0.0/4",
]

const RESERVED_IPV6_CIDRS = [
  "::/128",
  "::1/128",
  "64:ff9b::/96",
  "64:ff9b:1::/48",
  "100::/64",
  "2001::/32",
  "2001:20::/28",
  "2001:db8::/32",
  "2002::/16",
  "5f00::/16",
  "fc00::/7",
  "fe80::/10",
  "ff00::/8",
]

const PARSED_IPV4_CIDRS = RESERVED_IPV4_CIDRS.map((cidr) => parseCidr(cidr))
const PARSED_IPV6_CIDRS = RESERVED_IPV6_CIDRS.map((cidr) => parseCidr(cidr))

/** True for syntactically valid addresses outside private, loopback and reserved ranges. */
export function isPublicIp(ip: string): boolean {
  const parsed = parseIp(ip)
  if (!parsed) {
    return false
  }

  if (parsed.family === 4) {
    return !PARSED_IPV4_CIDRS.some((range) => cidrContains(range, parsed.value))
  }

  if (parsed.ipv4Mapped !== null) {
    const mapped = parsed.ipv4Mapped
    return !PARSED_IPV4_CIDRS.some((range) => cidrContains(range, mapped))
  }

  return !PARSED_IPV6_CIDRS.some((range) => cidrContains(range, parsed.value))
}

/** Strips brackets and zone ids and unwraps IPv4-mapped IPv6 addresses. */
export function normalizeIp(input: string): string | null {
  const trimmed = input.trim().replace(/^\[/, "").replace(/\]$/, "")
  const parsed = parseIp(trimmed)
  if (!parsed) {
    return null
  }

  if (parsed.ipv4Mapped !== null) {
    return formatIpv4(parsed.ipv4Mapped)
  }

  return parsed.family === 6 ? trimmed.split("%")[0]?.toLowerCase() ?? null : trimmed
}

export function isIpv4(ip: string): boolean {
  return isIP(ip) === 4
}

/** `1.2.3.4` becomes `4.3.2.1`, the owner name layout DNS blacklists expect. */
export function reverseIpv4(ip: string): string {
  return ip.split(".").reverse().join(".")
}

export function parseIp(input: string): ParsedIp | null {
  const family = isIP(input)
  if (family === 4) {
    const parsed = parseIpv4(input)
    if (parsed === null) {
      return null
    }
    return { family: 4, value: parsed, ipv4Mapped: null }
  }

  if (family === 6) {
    const parsed = parseIpv6(input)
    if (parsed === null) {
      return null
    }
    const mapped = parsed >> 32n === 0xffffn ? parsed & 0xffff_ffffn : null
    return { family: 6, value: parsed, ipv4Mapped: mapped }
  }

  return null
}

export function parseCidr(value: string): CidrRange {
  const [ip, prefixRaw] = value.split("/")
  if (!ip) {
    throw new Error(`Invalid CIDR range: ${value}`)
  }

  const parsed = parseIp(ip)
  if (!parsed) {
    throw new Error(`Invalid CIDR base address: ${value}`)
  }

  const width = parsed.family === 4 ? 32 : 128
  const prefix = prefixRaw === undefined ? width : Number.parseInt(prefixRaw, 10)
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > width) {
    throw new Error(`CIDR prefix out of range: ${value}`)
  }

  const mask = prefix === 0 ? 0n : ((1n << BigInt(prefix)) - 1n) << BigInt(width - prefix)
  return {
    family: parsed.family,
    network: parsed.value & mask,
    prefix,
    mask,
  }
}

export function cidrContains(range: CidrRange, value: bigint): boolean {
  if (range.prefix === 0) {
    return true
  }

  return (value & range.mask) === range.network
}

export function ipInRange(ip: string, range: CidrRange): boolean {
  const parsed = parseIp(ip)
  if (!parsed) {
    return false
  }

  if (range.family === 4) {
    const value = parsed.family === 4 ? parsed.value : parsed.ipv4Mapped
    return value !== null && cidrContains(range, value)
  }

  return parsed.family === 6 && cidrContains(range, parsed.value)
}

function formatIpv4(value: bigint): string {
  return [24n, 16n, 8n, 0n].map((shift) => String((value >> shift) & 0xffn)).join(".")
}

function parseIpv4(ip: string): bigint | null {
  const parts = ip.split(".")
  if (parts.length !== 4) {
    return null
  }

  let value = 0n
  for (const part of parts) {
    if (!/^\d+$/.test(part)) {
      return null
    }
    const octet = Number.parseInt(part, 10)
    if (!Number.isInteger(octet) || octet < 0 || octet > 255) {
      return null
    }
    value = (value << 8n) | BigInt(octet)
  }

  return value
}

function parseIpv6(ip: string): bigint | null {
  const normalized = ip.split("%")[0]?.toLowerCase() ?? ""
  if (!normalized) {
    return null
  }

  const doubleColonParts = normalized.split("::")
  if (doubleColonParts.length > 2) {
    return null
  }

  const leftRaw = doubleColonParts[0] ? doubleColonParts[0].split(":") : []
  const rightRaw = doubleColonParts[1] ? doubleColonParts[1].split(":") : []

  const left = expandIpv6Parts(leftRaw)
  const right = expandIpv6Parts(rightRaw)
  if (!left || !right) {
    return null
  }

  const groups: number[] =
    doubleColonParts.length === 2
      ? [...left, ...new Array<number>(8 - left.length - right.length).fill(0), ...right]
      : left

  if (groups.length !== 8) {
    return null
  }

  let value = 0n
  for (const group of groups) {
    value = (value << 16n) | BigInt(group)
  }

  return value
}

function expandIpv6Parts(parts: string[]): number[] | null {
  const groups: number[] = []
  for (let index = 0; index < parts.length; index += 1) {
    const part = parts[index]
    if (!part) {
      return null
    }

    if (part.includes(".")) {
      if (index !== parts.length - 1) {
        return null
      }
      const ipv4 = parseIpv4(part)
      if (ipv4 === null) {
        return null
      }
      groups.push(Number((ipv4 >> 16n) & 0xffffn))
      groups.push(Number(ipv4 & 0xffffn))
      continue
    }

    if (!/^[0-9a-f]{1,4}$/i.test(part)) {
      return null
    }

    groups.push(Number.parseInt(part, 16))
  }

  return groups
}
