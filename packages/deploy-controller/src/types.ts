import type { DeployPhase, RunStatus } from "@stackship/deploy-events"
import type { ServiceDescriptor } from "@stackship/shared"

export type { DeployPhase, RunStatus, ServiceDescriptor }

/**
 * How the session authenticates against the host
 */
export type SshAuth =
  | { kind: "privateKey"; path: string; passphrase?: string }
  | { kind: "password"; password: string }
  | { kind: "interactive" }

/**
 * Where to deploy. Immutable for the life of a run.
 */
export interface DeploymentTarget {
  /** Apex domain (e.g., example.com) */
  domain: string
  /** IPv4 or IPv6 address of the host */
  address: string
  /** SSH login user (default: root) */
  user?: string
  /** SSH port (default: 22) */
  port?: number
  auth: SshAuth
  /** ACME contact for the edge proxy (default: admin@<domain>) */
  acmeEmail?: string
}

export type DnsRecordType = "A" | "AAAA" | "CNAME"

/**
 * Provider-side DNS record. `id` is present once fetched or created.
 */
export interface DnsRecord {
  id?: string
  name: string
  type: DnsRecordType
  content: string
  ttl: number
  proxied: boolean
}

export interface DnsZone {
  id: string
  name: string
}

export type ReconcileAction = "created" | "updated" | "unchanged" | "failed"

export interface ReconcileOutcome {
  name: string
  action: ReconcileAction
  record?: DnsRecord
  error?: unknown
}

/**
 * Result of `docker compose ps` plus edge log inspection.
 * `healthy` is a heuristic read from log text, not a probe.
 */
export interface VerificationReport {
  healthy: boolean
  signal: "certificate_obtained" | "serving" | null
  statusText: string
  edgeLogText: string
  warnings: string[]
  urls: string[]
}

export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

export interface ExecuteOptions {
  /** Per-command bound (default: TIMEOUTS.REMOTE_COMMAND_MS) */
  timeoutMs?: number
  signal?: AbortSignal
}

/**
 * Input to a deployment run
 */
export interface DeployRequest {
  target: DeploymentTarget
  services: ServiceDescriptor[]
  /** Local directory that build contexts, mounts and extra files are relative to */
  localRoot: string
  /** Extra files to upload next to the services (relative to localRoot) */
  files?: string[]
  /** Reconcile DNS during the run (default: true when a provider is configured) */
  autoDns?: boolean
  /** Check resolver answers after reconciliation (default: true) */
  verifyDns?: boolean
}

/**
 * What a run is about to do, handed to the pre-flight confirmation callback
 */
export interface DeployPlan {
  runId: string
  target: DeploymentTarget
  services: string[]
  dnsNames: string[]
  remoteDir: string
  phases: DeployPhase[]
}

/**
 * Read-only view of a run. Snapshots never share mutable state with the registry.
 */
export interface DeploymentRun {
  id: string
  status: RunStatus
  phase: DeployPhase | null
  target: DeploymentTarget
  services: ServiceDescriptor[]
  createdAt: number
  startedAt?: number
  finishedAt?: number
  /** The error that failed the run, verbatim */
  error?: unknown
  completedPhases: DeployPhase[]
  dnsRecords: DnsRecord[]
  verification?: VerificationReport
}
