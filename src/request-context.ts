import { resolveClientIp } from "./lib/client-ip"
import { computeFingerprint } from "./lib/fingerprint"
import type { GeoIpRecord } from "./services/geoip"
import type { Settings } from "./settings"
import type { FieldMap, InboundRequest } from "./types"

/**
 * Per-request state. Everything derived from the request is computed on
 * first access and reused for the rest of the evaluation.
 */
export class RequestContext {
  readonly fields: FieldMap = new Map()
  // Extra fields already attempted, whether or not they produced a value.
  readonly attemptedFields = new Set<string>()
  readonly geoLookups = new Map<string, Promise<GeoIpRecord | null>>()

  settings: Readonly<Settings> | undefined

  private clientIpValue: string | null | undefined
  private fingerprintValue: string | undefined

  constructor(
    readonly request: InboundRequest,
    private readonly fingerprintSecret: string,
    readonly receivedAt: Date = new Date(),
  ) {}

  get clientIp(): string | null {
    if (this.clientIpValue === undefined) {
      this.clientIpValue = resolveClientIp(this.request.headers, this.request.remoteAddress)
    }
    return this.clientIpValue
  }

  get userAgent(): string {
    return this.request.headers["user-agent"] ?? ""
  }

  get fingerprint(): string {
    if (this.fingerprintValue === undefined) {
      this.fingerprintValue = computeFingerprint(this.clientIp, this.userAgent, this.fingerprintSecret)
    }
    return this.fingerprintValue
  }
}
