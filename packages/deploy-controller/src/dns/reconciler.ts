import { resolve4, resolve6 } from "node:dns/promises"
import { isIPv6 } from "node:net"
import { createServiceLogger, type Logger } from "@stackship/logger"
import { DEFAULTS, DNS, errorMessage, recordName, sleepWithAbort } from "@stackship/shared"
import { DNSProviderError, ZoneNotFoundError } from "../errors.js"
import type { DnsRecord, DnsRecordType, DnsZone, ReconcileOutcome } from "../types.js"
import type { DnsProvider } from "./provider.js"

/** Addresses a hostname resolves to. Throws when it does not resolve. */
export type HostResolver = (hostname: string, family: 4 | 6) => Promise<string[]>

export const systemResolver: HostResolver = (hostname, family) =>
  family === 6 ? resolve6(hostname) : resolve4(hostname)

export interface DnsReconcilerOptions {
  /** Wait after reconciliation (default: DEFAULTS.DNS_PROPAGATION_DELAY_MS) */
  propagationDelayMs?: number
  resolver?: HostResolver
  logger?: Logger
}

export interface ReconcileOptions {
  onOutcome?: (outcome: ReconcileOutcome) => void
  signal?: AbortSignal
}

export function recordTypeFor(address: string): DnsRecordType {
  return isIPv6(address) ? "AAAA" : "A"
}

/**
 * Desired names for a domain, apex first
 */
export function desiredRecordNames(domain: string): string[] {
  return DNS.DESIRED_SUBDOMAINS.map(label => recordName(label, domain))
}

/**
 * Brings the provider's records for a domain to the desired state with the
 * fewest writes. Running it twice against unchanged state writes nothing.
 */
export class DnsReconciler {
  private readonly propagationDelayMs: number
  private readonly resolver: HostResolver
  private readonly logger: Logger

  constructor(
    private readonly provider: DnsProvider,
    options: DnsReconcilerOptions = {},
  ) {
    this.propagationDelayMs = options.propagationDelayMs ?? DEFAULTS.DNS_PROPAGATION_DELAY_MS
    this.resolver = options.resolver ?? systemResolver
    this.logger = options.logger ?? createServiceLogger("DNS")
  }

  /**
   * Reconcile every desired name. Per-name failures are logged and reported
   * as `failed` outcomes; the returned records are the ones in the desired state.
   *
   * @throws ZoneNotFoundError when no zone matches the domain
   */
  async reconcile(domain: string, address: string, options: ReconcileOptions = {}): Promise<DnsRecord[]> {
    const zone = await this.findZone(domain)
    const type = recordTypeFor(address)
    const records: DnsRecord[] = []

    for (const name of desiredRecordNames(domain)) {
      const outcome = await this.reconcileName(zone, name, type, address)
      if (outcome.record && outcome.action !== "failed") {
        records.push(outcome.record)
      }
      options.onOutcome?.(outcome)
    }

    this.logger.info(`${records.length}/${DNS.DESIRED_SUBDOMAINS.length} records in desired state for ${domain}`)

    if (this.propagationDelayMs > 0) {
      await sleepWithAbort(this.propagationDelayMs, options.signal)
    }
    return records
  }

  /**
   * Exact-name lookup first, then a linear scan of the paginated zone listing.
   */
  async findZone(domain: string): Promise<DnsZone> {
    if (this.provider.findZoneByName) {
      try {
        const zone = await this.provider.findZoneByName(domain)
        if (zone) return zone
      } catch (error) {
        this.logger.debug(`Direct zone lookup failed: ${errorMessage(error)}`)
      }
    }

    for (let page = 1; ; page++) {
      const { zones, totalPages } = await this.provider.listZones(page)
      const match = zones.find(zone => zone.name === domain)
      if (match) return match
      if (zones.length === 0 || page >= totalPages) break
    }

    throw new ZoneNotFoundError(domain)
  }

  /**
   * Compare resolver answers with the expected address. Never throws.
   */
  async verifyPropagation(domain: string, expectedAddress: string): Promise<Record<string, boolean>> {
    const family = isIPv6(expectedAddress) ? 6 : 4
    const results: Record<string, boolean> = {}

    for (const name of desiredRecordNames(domain)) {
      try {
        const addresses = await this.resolver(name, family)
        results[name] = addresses.includes(expectedAddress)
        if (!results[name]) {
          this.logger.warn(`${name} -> ${addresses.join(", ") || "nothing"} (expected ${expectedAddress})`)
        }
      } catch (error) {
        results[name] = false
        this.logger.warn(`${name} does not resolve yet: ${errorMessage(error)}`)
      }
    }
    return results
  }

  /**
   * Delete the app, site and api A records. Apex and www are kept.
   *
   * @returns number of records deleted
   */
  async cleanup(domain: string): Promise<number> {
    let zone: DnsZone
    try {
      zone = await this.findZone(domain)
    } catch (error) {
      if (error instanceof ZoneNotFoundError) {
        this.logger.warn(error.message)
        return 0
      }
      throw error
    }

    let deleted = 0
    for (const label of DNS.CLEANUP_SUBDOMAINS) {
      const name = recordName(label, domain)
      try {
        const matches = (await this.provider.listRecords(zone.id, "A", name)).filter(record => record.name === name)
        for (const record of matches) {
          if (!record.id) continue
          await this.provider.deleteRecord(zone.id, record.id)
          deleted++
          this.logger.info(`Deleted ${name}`)
        }
      } catch (error) {
        this.logger.warn(`Failed to delete ${name}: ${errorMessage(error)}`)
      }
    }
    return deleted
  }

  private async reconcileName(
    zone: DnsZone,
    name: string,
    type: DnsRecordType,
    address: string,
  ): Promise<ReconcileOutcome> {
    try {
      const existing = (await this.provider.listRecords(zone.id, type, name)).find(record => record.name === name)

      if (!existing) {
        const record = await this.provider.createRecord(zone.id, { name, type, content: address })
        this.logger.info(`Created ${type} ${name} -> ${address}`)
        return { name, action: "created", record }
      }

      if (existing.content === address) {
        this.logger.debug(`${name} already points to ${address}`)
        return { name, action: "unchanged", record: existing }
      }

      if (!existing.id) {
        throw new DNSProviderError(`Record ${name} has no provider id`)
      }
      const record = await this.provider.updateRecord(zone.id, existing.id, { name, type, content: address })
      this.logger.info(`Updated ${type} ${name}: ${existing.content} -> ${address}`)
      return { name, action: "updated", record }
    } catch (error) {
      this.logger.error(`Failed to reconcile ${name}: ${errorMessage(error)}`)
      return { name, action: "failed", error }
    }
  }
}
