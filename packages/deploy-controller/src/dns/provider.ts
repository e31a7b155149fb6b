import type { DnsRecord, DnsRecordType, DnsZone } from "../types.js"

export interface ZonePage {
  zones: DnsZone[]
  totalPages: number
}

export interface RecordInput {
  name: string
  type: DnsRecordType
  content: string
}

/**
 * Everything the reconciler needs from a DNS provider.
 * TTL and proxy settings belong to the provider instance.
 */
export interface DnsProvider {
  readonly name: string

  /** Exact-name zone lookup. Optional: providers without it fall back to listing. */
  findZoneByName?(name: string): Promise<DnsZone | null>

  /** One page of the zone listing, 1-based */
  listZones(page: number): Promise<ZonePage>

  listRecords(zoneId: string, type: DnsRecordType, name?: string): Promise<DnsRecord[]>

  createRecord(zoneId: string, record: RecordInput): Promise<DnsRecord>

  /** Update in place. The record keeps its id. */
  updateRecord(zoneId: string, recordId: string, record: RecordInput): Promise<DnsRecord>

  deleteRecord(zoneId: string, recordId: string): Promise<void>
}
