import { readFileSync } from "node:fs"
import { z } from "zod"
import { ConfigurationError } from "../lib/errors"
import { ipInRange, parseCidr, type CidrRange } from "../lib/network"
import type { FieldValue } from "../types"

export type GeoIpRecord = Record<string, FieldValue>

export interface GeoIpProvider {
  readonly name: string
  /** Field names this provider can supply. */
  readonly fields: ReadonlySet<string>
  lookup(ip: string): Promise<GeoIpRecord | null>
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const GeoIpTableSchema = z.array(
  z.object({
    cidr: z.string().min(1),
    fields: z.record(ScalarSchema),
  }),
)

interface TableEntry {
  range: CidrRange
  fields: GeoIpRecord
}

/**
 * GeoIP/ASN data from a JSON table of CIDR blocks. The most specific block
 * containing the address wins.
 */
export class StaticGeoIpProvider implements GeoIpProvider {
  readonly fields: ReadonlySet<string>
  private readonly entries: TableEntry[]

  constructor(
    readonly name: string,
    table: unknown,
  ) {
    const parsed = GeoIpTableSchema.safeParse(table)
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid GeoIP table for ${name}`, parsed.error.flatten())
    }

    const fields = new Set<string>()
    this.entries = parsed.data.map((row) => {
      let range: CidrRange
      try {
        range = parseCidr(row.cidr)
      } catch (error) {
        throw new ConfigurationError(`Invalid GeoIP block ${row.cidr} for ${name}`, error)
      }

      for (const key of Object.keys(row.fields)) {
        fields.add(key)
      }

      return { range, fields: row.fields }
    })

    this.entries.sort((left, right) => right.range.prefix - left.range.prefix)
    this.fields = fields
  }

  static fromFile(name: string, path: string): StaticGeoIpProvider {
    let table: unknown
    try {
      table = JSON.parse(readFileSync(path, "utf8"))
    } catch (error) {
      throw new ConfigurationError(`Could not read GeoIP table from ${path}`, error)
    }

    return new StaticGeoIpProvider(name, table)
  }

  async lookup(ip: string): Promise<GeoIpRecord | null> {
    const match = this.entries.find((entry) => ipInRange(ip, entry.range))
    return match ? { ...match.fields } : null
  }
}
