/**
 * Progress events emitted by a deployment run.
 *
 * These types are the contract between:
 * - DeploymentCoordinator (emits events)
 * - Presentation layers (CLI output, REST/WebSocket facades)
 *
 * IMPORTANT: Changes here affect both. Version bump required for breaking changes.
 */

// Protocol version for compatibility checks
export const DEPLOY_PROTOCOL_VERSION = "1.0.0"

// Valid deploy event types
export const DEPLOY_EVENT_TYPES = ["run_status", "phase_start", "phase_complete", "step"] as const

export type DeployEventType = (typeof DEPLOY_EVENT_TYPES)[number]

export const RUN_STATUSES = ["queued", "running", "completed", "failed", "cancelled"] as const

export type RunStatus = (typeof RUN_STATUSES)[number]

/** Fixed, total phase order of a run */
export const DEPLOY_PHASES = ["connect", "dns", "host_prep", "transfer", "orchestrate", "verify"] as const

export type DeployPhase = (typeof DEPLOY_PHASES)[number]

export type StepLevel = "info" | "warn"

// Base event shared by every type
export interface BaseDeployEvent {
  /** Run that produced the event */
  runId: string
  /** Unix timestamp in milliseconds */
  timestamp: number
  /** Human-readable description */
  message: string
}

/** Run entered a new status */
export interface RunStatusEvent extends BaseDeployEvent {
  type: "run_status"
  status: RunStatus
  /** Phase the run was in when a failure or cancellation happened */
  phase?: DeployPhase
  /** Error code of the terminal failure */
  errorCode?: string
}

export interface PhaseStartEvent extends BaseDeployEvent {
  type: "phase_start"
  phase: DeployPhase
  /** 1-based position in DEPLOY_PHASES */
  index: number
  total: number
}

export interface PhaseCompleteEvent extends BaseDeployEvent {
  type: "phase_complete"
  phase: DeployPhase
  /** Phase duration in milliseconds */
  durationMs: number
  /** True when the phase had nothing to do (e.g. DNS without a provider) */
  skipped: boolean
}

/** Progress inside a phase. Verification warnings use level "warn". */
export interface StepEvent extends BaseDeployEvent {
  type: "step"
  phase: DeployPhase
  level: StepLevel
}

/** Union of all deploy event types */
export type DeployEvent = RunStatusEvent | PhaseStartEvent | PhaseCompleteEvent | StepEvent

/**
 * Type guard for deploy events
 */
export function isDeployEvent(e: unknown): e is DeployEvent {
  if (typeof e !== "object" || e === null || !("type" in e) || !("runId" in e)) {
    return false
  }
  return typeof e.runId === "string" && DEPLOY_EVENT_TYPES.some(type => type === e.type)
}

export function isTerminalStatus(status: RunStatus): boolean {
  return status === "completed" || status === "failed" || status === "cancelled"
}

/**
 * One-line rendering used by console presenters
 *
 * @example
 * formatDeployEvent({ type: "phase_start", phase: "dns", index: 2, total: 6, ... })
 * // "[Phase 2/6] Reconciling DNS records"
 */
export function formatDeployEvent(event: DeployEvent): string {
  switch (event.type) {
    case "run_status":
      return `[${event.status}] ${event.message}`
    case "phase_start":
      return `[Phase ${event.index}/${event.total}] ${event.message}`
    case "phase_complete":
      return event.skipped ? `[${event.phase}] skipped: ${event.message}` : `[${event.phase}] ${event.message}`
    case "step":
      return event.level === "warn" ? `  ⚠ ${event.message}` : `  ${event.message}`
  }
}
