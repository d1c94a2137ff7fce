import type { ReputationKind } from "../../types"
import type { GeoIpProvider, GeoIpRecord } from "../geoip"
import { matchesHostingOperator, unknownResult, type ProviderResult, type ReputationProvider } from "./provider"

const ANONYMITY_FLAGS = [
  "is_anonymous",
  "is_anonymous_vpn",
  "is_hosting_provider",
  "is_public_proxy",
  "is_residential_proxy",
  "is_tor_exit_node",
]

const ORGANIZATION_FIELDS = ["asn_org", "autonomous_system_organization", "isp"]

/** Local last resort: anonymous-network flags and ASN organization from GeoIP data. */
export class GeoIpReputationProvider implements ReputationProvider {
  readonly id = "geoip" as const
  readonly kinds: readonly ReputationKind[] = ["malicious"]

  constructor(private readonly geoProviders: readonly GeoIpProvider[]) {}

  async check(ip: string, _signal: AbortSignal): Promise<ProviderResult> {
    const records: GeoIpRecord[] = []
    for (const provider of this.geoProviders) {
      const record = await provider.lookup(ip)
      if (record) {
        records.push(record)
      }
    }

    if (records.length === 0) {
      return unknownResult()
    }

    const flagged = records.some(
      (record) =>
        ANONYMITY_FLAGS.some((flag) => record[flag] === true) ||
        ORGANIZATION_FIELDS.some((field) => matchesHostingOperator(record[field])),
    )

    return { verdict: flagged ? "flagged" : "clean", raw: records }
  }
}
