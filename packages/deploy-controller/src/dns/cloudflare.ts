import { type DeployEnv, getCloudflareSettings } from "@stackship/env/server"
import { DEFAULTS, DNS, errorMessage, isAbortError, TIMEOUTS } from "@stackship/shared"
import { z } from "zod"
import { DNSProviderError } from "../errors.js"
import type { DnsRecord, DnsRecordType, DnsZone } from "../types.js"
import type { DnsProvider, RecordInput, ZonePage } from "./provider.js"

export const CLOUDFLARE_API_BASE = "https://api.cloudflare.com/client/v4"

const messageSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
})

const envelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(messageSchema).default([]),
  result: z.unknown(),
  result_info: z
    .object({
      page: z.number().optional(),
      total_pages: z.number().optional(),
    })
    .nullish(),
})

const zoneSchema = z.object({
  id: z.string(),
  name: z.string(),
})

const recordSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.enum(["A", "AAAA", "CNAME"]),
  content: z.string(),
  ttl: z.number(),
  proxied: z.boolean().optional(),
})

type CloudflareRecord = z.infer<typeof recordSchema>

export interface CloudflareDnsProviderOptions {
  apiToken: string
  /** Sent as X-Auth-Email when set */
  email?: string
  /** Default: DEFAULTS.DNS_PROXIED */
  proxied?: boolean
  /** Default: DEFAULTS.DNS_TTL */
  ttl?: number
  /** Per-request timeout (default: TIMEOUTS.DNS_REQUEST_MS) */
  timeoutMs?: number
  baseUrl?: string
  fetch?: typeof fetch
}

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE"

function toDnsRecord(record: CloudflareRecord): DnsRecord {
  return {
    id: record.id,
    name: record.name,
    type: record.type,
    content: record.content,
    ttl: record.ttl,
    proxied: record.proxied ?? false,
  }
}

/**
 * DnsProvider over the Cloudflare v4 REST API.
 * One request per call, no retry.
 */
export class CloudflareDnsProvider implements DnsProvider {
  readonly name = "cloudflare"
  readonly proxied: boolean
  readonly ttl: number

  private readonly headers: Record<string, string>
  private readonly timeoutMs: number
  private readonly baseUrl: string
  private readonly fetchImpl?: typeof fetch

  constructor(options: CloudflareDnsProviderOptions) {
    this.proxied = options.proxied ?? DEFAULTS.DNS_PROXIED
    this.ttl = options.ttl ?? DEFAULTS.DNS_TTL
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.DNS_REQUEST_MS
    this.baseUrl = options.baseUrl ?? CLOUDFLARE_API_BASE
    this.fetchImpl = options.fetch

    this.headers = {
      Authorization: `Bearer ${options.apiToken}`,
      "Content-Type": "application/json",
    }
    if (options.email) {
      this.headers["X-Auth-Email"] = options.email
    }
  }

  async findZoneByName(name: string): Promise<DnsZone | null> {
    const { result } = await this.request("GET", `/zones?name=${encodeURIComponent(name)}`, z.array(zoneSchema))
    return result.find(zone => zone.name === name) ?? null
  }

  async listZones(page: number): Promise<ZonePage> {
    const { result, totalPages } = await this.request(
      "GET",
      `/zones?page=${page}&per_page=${DNS.ZONE_PAGE_SIZE}`,
      z.array(zoneSchema),
    )
    return { zones: result, totalPages }
  }

  async listRecords(zoneId: string, type: DnsRecordType, name?: string): Promise<DnsRecord[]> {
    const query = new URLSearchParams({ type, per_page: "100" })
    if (name) query.set("name", name)

    const { result } = await this.request("GET", `/zones/${zoneId}/dns_records?${query}`, z.array(recordSchema))
    return result.map(toDnsRecord)
  }

  async createRecord(zoneId: string, record: RecordInput): Promise<DnsRecord> {
    const { result } = await this.request("POST", `/zones/${zoneId}/dns_records`, recordSchema, this.body(record))
    return toDnsRecord(result)
  }

  async updateRecord(zoneId: string, recordId: string, record: RecordInput): Promise<DnsRecord> {
    const { result } = await this.request(
      "PUT",
      `/zones/${zoneId}/dns_records/${recordId}`,
      recordSchema,
      this.body(record),
    )
    return toDnsRecord(result)
  }

  async deleteRecord(zoneId: string, recordId: string): Promise<void> {
    await this.request("DELETE", `/zones/${zoneId}/dns_records/${recordId}`, z.object({ id: z.string() }))
  }

  private body(record: RecordInput) {
    return {
      type: record.type,
      name: record.name,
      content: record.content,
      ttl: this.ttl,
      proxied: this.proxied,
    }
  }

  private async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T>,
    body?: object,
  ): Promise<{ result: T; totalPages: number }> {
    const doFetch = this.fetchImpl ?? fetch

    let response: Response
    try {
      response = await doFetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      if (isAbortError(error)) {
        throw new DNSProviderError(`Cloudflare request timed out after ${this.timeoutMs}ms: ${method} ${path}`, {
          cause: error,
        })
      }
      throw new DNSProviderError(`Cloudflare request failed: ${errorMessage(error)}`, { cause: error })
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new DNSProviderError(`Cloudflare returned a non-JSON response (HTTP ${response.status})`, {
        httpStatus: response.status,
        cause: error,
      })
    }

    const envelope = envelopeSchema.safeParse(payload)
    if (!envelope.success) {
      throw new DNSProviderError(`Unexpected Cloudflare response (HTTP ${response.status})`, {
        httpStatus: response.status,
        cause: envelope.error,
      })
    }

    const { success, errors, result, result_info } = envelope.data
    if (!response.ok || !success) {
      const detail = errors.length > 0 ? errors.map(e => e.message).join("; ") : `HTTP ${response.status}`
      throw new DNSProviderError(`Cloudflare API error: ${detail}`, { httpStatus: response.status })
    }

    const parsed = schema.safeParse(result)
    if (!parsed.success) {
      throw new DNSProviderError(`Unexpected Cloudflare result for ${method} ${path}`, {
        httpStatus: response.status,
        cause: parsed.error,
      })
    }

    return { result: parsed.data, totalPages: result_info?.total_pages ?? 1 }
  }
}

/**
 * Provider from CLOUDFLARE_* variables, or null when no token is configured.
 */
export function createCloudflareProviderFromEnv(env?: DeployEnv): CloudflareDnsProvider | null {
  const settings = getCloudflareSettings(env)
  if (!settings) {
    return null
  }
  return new CloudflareDnsProvider(settings)
}
