import { describe, expect, test } from "vitest"
import { ProviderError } from "../src/lib/errors"
import { StaticGeoIpProvider } from "../src/services/geoip"
import { DnsblTorProvider } from "../src/services/reputation/dnsbl"
import { ExoneratorTorProvider, streamContains } from "../src/services/reputation/exonerator"
import { GeoIpReputationProvider } from "../src/services/reputation/geoip-reputation"
import { IpApiProvider } from "../src/services/reputation/ip-api"
import { IpIntelProvider } from "../src/services/reputation/ipintel"
import { matchesHostingOperator } from "../src/services/reputation/provider"
import { jsonFetchResponse, textFetchResponse } from "./helpers"

const IP = "203.0.113.9"

function signal(): AbortSignal {
  return new AbortController().signal
}

function recordingFetch(respond: () => Response) {
  const urls: string[] = []
  const fetchImpl = async (input: string | URL | Request): Promise<Response> => {
    urls.push(String(input))
    return respond()
  }
  return { urls, fetchImpl }
}

function chunkedStream(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder()
  let index = 0
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index]
      index += 1
      if (chunk === undefined) {
        controller.close()
        return
      }
      controller.enqueue(encoder.encode(chunk))
    },
  })
}

describe("hosting operator deny-list", () => {
  test("matches case-insensitively inside longer names", () => {
    expect(matchesHostingOperator("AS16509 Amazon.com, Inc.")).toBe(true)
    expect(matchesHostingOperator("hetzner online gmbh")).toBe(true)
    expect(matchesHostingOperator("Example Residential Broadband")).toBe(false)
    expect(matchesHostingOperator(undefined)).toBe(false)
  })
})

describe("ip-api provider", () => {
  test("requests the documented fields", async () => {
    const { urls, fetchImpl } = recordingFetch(() => jsonFetchResponse({ status: "success", proxy: false, hosting: false }))
    await new IpApiProvider({ fetchImpl }).check(IP, signal())

    expect(urls).toEqual([`http://ip-api.com/json/${IP}?fields=status,proxy,hosting,isp,org,as`])
  })

  test("flags proxy or hosting addresses", async () => {
    const { fetchImpl } = recordingFetch(() => jsonFetchResponse({ status: "success", proxy: false, hosting: true }))
    const result = await new IpApiProvider({ fetchImpl }).check(IP, signal())

    expect(result.verdict).toBe("flagged")
  })

  test("flags deny-listed organizations", async () => {
    const { fetchImpl } = recordingFetch(() =>
      jsonFetchResponse({ status: "success", proxy: false, hosting: false, org: "Amazon Technologies Inc." }),
    )
    const result = await new IpApiProvider({ fetchImpl }).check(IP, signal())

    expect(result.verdict).toBe("flagged")
  })

  test("clean when neither flag nor organization matches", async () => {
    const { fetchImpl } = recordingFetch(() =>
      jsonFetchResponse({
        status: "success",
        proxy: false,
        hosting: false,
        isp: "Example Residential Broadband",
        org: "",
        as: "AS64500 Example Residential Broadband",
      }),
    )
    const result = await new IpApiProvider({ fetchImpl }).check(IP, signal())

    expect(result.verdict).toBe("clean")
  })

  test("unknown when the answer carries no classification", async () => {
    const { fetchImpl } = recordingFetch(() => jsonFetchResponse({ status: "fail", message: "reserved range" }))
    const result = await new IpApiProvider({ fetchImpl }).check(IP, signal())

    expect(result.verdict).toBe("unknown")
  })

  test("non-2xx responses raise a provider error", async () => {
    const { fetchImpl } = recordingFetch(() => jsonFetchResponse({}, 503))

    await expect(new IpApiProvider({ fetchImpl }).check(IP, signal())).rejects.toThrow(ProviderError)
  })
})

describe("ipintel provider", () => {
  test("sends the contact address and flags high probabilities", async () => {
    const { urls, fetchImpl } = recordingFetch(() => textFetchResponse("0.95\n"))
    const result = await new IpIntelProvider("ops@example.com", { fetchImpl }).check(IP, signal())

    expect(urls).toEqual([`https://check.getipintel.net/check.php?ip=${IP}&contact=ops%40example.com`])
    expect(result).toEqual({ verdict: "flagged", raw: 0.95 })
  })

  test("clean below the threshold", async () => {
    const { fetchImpl } = recordingFetch(() => textFetchResponse("0.2"))
    const result = await new IpIntelProvider("ops@example.com", { fetchImpl }).check(IP, signal())

    expect(result.verdict).toBe("clean")
  })

  test("negative error codes and garbage are unknown", async () => {
    const negative = recordingFetch(() => textFetchResponse("-4"))
    const garbage = recordingFetch(() => textFetchResponse("<html>oops</html>"))

    expect((await new IpIntelProvider("ops@example.com", negative).check(IP, signal())).verdict).toBe("unknown")
    expect((await new IpIntelProvider("ops@example.com", garbage).check(IP, signal())).verdict).toBe("unknown")
  })

  test("refuses to run without a contact address", async () => {
    const { urls, fetchImpl } = recordingFetch(() => textFetchResponse("0.1"))

    await expect(new IpIntelProvider("", { fetchImpl }).check(IP, signal())).rejects.toThrow(ProviderError)
    expect(urls).toEqual([])
  })
})

describe("dnsbl tor provider", () => {
  test("queries the reversed address under the zone", async () => {
    const queries: string[] = []
    const provider = new DnsblTorProvider("dnsel.torproject.org", {
      resolve4: async (hostname) => {
        queries.push(hostname)
        return ["127.0.0.2"]
      },
    })

    expect(await provider.check(IP, signal())).toEqual({
      verdict: "flagged",
      raw: { query: "9.113.0.203.dnsel.torproject.org", answers: ["127.0.0.2"] },
    })
    expect(queries).toEqual(["9.113.0.203.dnsel.torproject.org"])
  })

  test("no record means clean", async () => {
    const provider = new DnsblTorProvider("dnsel.torproject.org", {
      resolve4: async () => {
        throw Object.assign(new Error("queryA ENOTFOUND"), { code: "ENOTFOUND" })
      },
    })

    expect((await provider.check(IP, signal())).verdict).toBe("clean")
  })

  test("other resolver failures propagate", async () => {
    const provider = new DnsblTorProvider("dnsel.torproject.org", {
      resolve4: async () => {
        throw Object.assign(new Error("queryA ETIMEOUT"), { code: "ETIMEOUT" })
      },
    })

    await expect(provider.check(IP, signal())).rejects.toThrow("ETIMEOUT")
  })

  test("IPv6 addresses are unknown without a lookup", async () => {
    let called = false
    const provider = new DnsblTorProvider("dnsel.torproject.org", {
      resolve4: async () => {
        called = true
        return []
      },
    })

    expect((await provider.check("2001:4860::1", signal())).verdict).toBe("unknown")
    expect(called).toBe(false)
  })
})

describe("exonerator tor provider", () => {
  test("asks about the day before yesterday", () => {
    const provider = new ExoneratorTorProvider({ now: () => Date.UTC(2024, 0, 10, 12) })

    expect(provider.lookupUrl(IP)).toBe(
      `https://metrics.torproject.org/exonerator.html?ip=${IP}&timestamp=2024-01-08&lang=en`,
    )
  })

  test("finds a marker split across chunks and stops reading", async () => {
    const result = await streamContains(
      chunkedStream(["<html>Result is pos", "itive</html>", "x".repeat(4096)]),
      "Result is positive",
    )

    expect(result).toEqual({ matched: true, bytesRead: 31 })
  })

  test("reads to the end when the marker is absent", async () => {
    const result = await streamContains(chunkedStream(["<html>Result is ", "negative</html>"]), "Result is positive")

    expect(result).toEqual({ matched: false, bytesRead: 31 })
  })

  test("flags positive pages", async () => {
    const { fetchImpl } = recordingFetch(
      () => new Response(chunkedStream(["<p>Result is positive</p>"]), { status: 200 }),
    )
    const provider = new ExoneratorTorProvider({ fetchImpl, now: () => Date.UTC(2024, 0, 10) })

    expect((await provider.check(IP, signal())).verdict).toBe("flagged")
  })

  test("non-2xx responses raise a provider error", async () => {
    const { fetchImpl } = recordingFetch(() => textFetchResponse("unavailable", 502))
    const provider = new ExoneratorTorProvider({ fetchImpl })

    await expect(provider.check(IP, signal())).rejects.toThrow(ProviderError)
  })
})

describe("geoip reputation provider", () => {
  const table = [
    { cidr: "198.51.100.0/24", fields: { asn_org: "Example Transit" } },
    { cidr: "203.0.113.0/24", fields: { asn_org: "Example Hosting Cloud" } },
    { cidr: "203.0.113.128/25", fields: { asn_org: "Example Access", is_anonymous_vpn: true } },
  ]
  const provider = new GeoIpReputationProvider([new StaticGeoIpProvider("test", table)])

  test("flags anonymity networks", async () => {
    expect((await provider.check("203.0.113.200", signal())).verdict).toBe("flagged")
  })

  test("flags deny-listed ASN organizations", async () => {
    expect((await provider.check("203.0.113.5", signal())).verdict).toBe("flagged")
  })

  test("clean for ordinary networks", async () => {
    expect((await provider.check("198.51.100.7", signal())).verdict).toBe("clean")
  })

  test("unknown without data", async () => {
    expect((await provider.check("192.0.2.1", signal())).verdict).toBe("unknown")
  })
})
