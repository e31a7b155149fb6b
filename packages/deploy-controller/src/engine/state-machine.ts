/**
 * Run State Machine
 *
 * Manages the lifecycle of a single deployment run.
 * States: queued → running → (completed | failed | cancelled)
 */

import { createServiceLogger, type Logger } from "@stackship/logger"
import type { DeployPhase, RunStatus } from "@stackship/deploy-events"
import type { DeploymentRun, DeploymentTarget, DnsRecord, ServiceDescriptor, VerificationReport } from "../types.js"

export const RUN_STATES = {
  QUEUED: "queued",
  RUNNING: "running",
  COMPLETED: "completed",
  FAILED: "failed",
  CANCELLED: "cancelled",
} as const satisfies Record<string, RunStatus>

// Valid state transitions
const VALID_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RUN_STATES.QUEUED]: [RUN_STATES.RUNNING, RUN_STATES.CANCELLED],
  [RUN_STATES.RUNNING]: [RUN_STATES.COMPLETED, RUN_STATES.FAILED, RUN_STATES.CANCELLED],
  // Terminal states - no transitions allowed
  [RUN_STATES.COMPLETED]: [],
  [RUN_STATES.FAILED]: [],
  [RUN_STATES.CANCELLED]: [],
}

export interface RunContext {
  id: string
  target: DeploymentTarget
  services: ServiceDescriptor[]
  createdAt: number
  startedAt?: number
  finishedAt?: number
  phase: DeployPhase | null
  error?: unknown
  completedPhases: DeployPhase[]
  dnsRecords: DnsRecord[]
  verification?: VerificationReport
}

export class RunStateMachine {
  private state: RunStatus = RUN_STATES.QUEUED
  private context: RunContext
  private onStateChange?: (state: RunStatus, context: Readonly<RunContext>) => void
  private logger: Logger

  constructor(
    context: Pick<RunContext, "id" | "target" | "services">,
    options?: {
      onStateChange?: (state: RunStatus, context: Readonly<RunContext>) => void
      logger?: Logger
    },
  ) {
    this.context = {
      ...context,
      createdAt: Date.now(),
      phase: null,
      completedPhases: [],
      dnsRecords: [],
    }
    this.onStateChange = options?.onStateChange
    this.logger = options?.logger ?? createServiceLogger("StateMachine", context.id)
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  get currentState(): RunStatus {
    return this.state
  }

  get currentContext(): Readonly<RunContext> {
    return this.context
  }

  isTerminal(): boolean {
    return VALID_TRANSITIONS[this.state].length === 0
  }

  canTransitionTo(target: RunStatus): boolean {
    return VALID_TRANSITIONS[this.state].includes(target)
  }

  // ===========================================================================
  // State Transitions
  // ===========================================================================

  /**
   * Start running (first phase about to be invoked)
   */
  start(): boolean {
    const success = this.transition(RUN_STATES.RUNNING)
    if (success) {
      this.context.startedAt = Date.now()
    }
    return success
  }

  /**
   * Mark as completed after every phase succeeded
   */
  complete(): boolean {
    const success = this.transition(RUN_STATES.COMPLETED)
    if (success) {
      this.context.finishedAt = Date.now()
    }
    return success
  }

  /**
   * Mark as failed. The error is kept as-is.
   */
  fail(error: unknown): boolean {
    const success = this.transition(RUN_STATES.FAILED)
    if (success) {
      this.context.error = error
      this.context.finishedAt = Date.now()
    }
    return success
  }

  /**
   * Mark as cancelled. Effects of phases already run stay in place.
   */
  cancel(): boolean {
    const success = this.transition(RUN_STATES.CANCELLED)
    if (success) {
      this.context.finishedAt = Date.now()
    }
    return success
  }

  // ===========================================================================
  // Phase Tracking
  // ===========================================================================

  enterPhase(phase: DeployPhase): void {
    this.context.phase = phase
  }

  completePhase(phase: DeployPhase): void {
    if (!this.context.completedPhases.includes(phase)) {
      this.context.completedPhases.push(phase)
    }
  }

  recordDns(records: DnsRecord[]): void {
    this.context.dnsRecords = records
  }

  recordVerification(report: VerificationReport): void {
    this.context.verification = report
  }

  /**
   * Copy of the run that shares no mutable state with the machine.
   * The error instance is passed through unchanged.
   */
  snapshot(): DeploymentRun {
    const ctx = this.context
    return {
      id: ctx.id,
      status: this.state,
      phase: ctx.phase,
      target: copyTarget(ctx.target),
      services: ctx.services.map(copyService),
      createdAt: ctx.createdAt,
      startedAt: ctx.startedAt,
      finishedAt: ctx.finishedAt,
      error: ctx.error,
      completedPhases: [...ctx.completedPhases],
      dnsRecords: ctx.dnsRecords.map(record => ({ ...record })),
      verification: ctx.verification
        ? { ...ctx.verification, warnings: [...ctx.verification.warnings], urls: [...ctx.verification.urls] }
        : undefined,
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private transition(target: RunStatus): boolean {
    if (!this.canTransitionTo(target)) {
      this.logger.debug(`Invalid transition: ${this.state} → ${target}`)
      return false
    }

    const previous = this.state
    this.state = target

    this.logger.debug(`${previous} → ${target}`)

    this.onStateChange?.(this.state, this.context)
    return true
  }
}

export function copyTarget(target: DeploymentTarget): DeploymentTarget {
  return { ...target, auth: { ...target.auth } }
}

export function copyService(service: ServiceDescriptor): ServiceDescriptor {
  return {
    ...service,
    aliases: service.aliases ? [...service.aliases] : undefined,
    environment: service.environment ? { ...service.environment } : undefined,
    dependsOn: service.dependsOn ? [...service.dependsOn] : undefined,
    mounts: service.mounts?.map(mount => ({ ...mount })),
  }
}
