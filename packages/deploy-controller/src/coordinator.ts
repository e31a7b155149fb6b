import { randomUUID } from "node:crypto"
import { isIP } from "node:net"
import {
  DEPLOY_PHASES,
  type DeployEvent,
  type DeployPhase,
  formatDeployEvent,
  type StepLevel,
} from "@stackship/deploy-events"
import type { DeployEnv } from "@stackship/env/server"
import {
  createErrorLogger,
  createServiceLogger,
  type ErrorLogContext,
  type ErrorLogger,
  type Logger,
} from "@stackship/logger"
import { DNS, errorMessage, extractErrorCode, normalizeDomain, type ServiceDescriptor } from "@stackship/shared"
import { createCloudflareProviderFromEnv } from "./dns/cloudflare.js"
import { DnsReconciler, type DnsReconcilerOptions, desiredRecordNames } from "./dns/reconciler.js"
import { EventChannel, type EventListener } from "./engine/event-channel.js"
import { type RunHandle, RunRegistry } from "./engine/run-registry.js"
import { copyService, copyTarget, RunStateMachine } from "./engine/state-machine.js"
import { CancelledError, DeploymentError } from "./errors.js"
import { ContainerOrchestrator, type LogOptions } from "./executors/containers.js"
import { HostPreparer } from "./executors/host.js"
import { ArtifactTransfer } from "./executors/transfer.js"
import { createCredentialResolverFromEnv } from "./session/credentials.js"
import type { RemoteSession, SessionFactory } from "./session/remote-session.js"
import { createSshSessionFactory } from "./session/ssh-session.js"
import type { DeploymentRun, DeploymentTarget, DeployPlan, DeployRequest } from "./types.js"

const PHASE_TITLES: Record<DeployPhase, string> = {
  connect: "Connecting to host",
  dns: "Reconciling DNS records",
  host_prep: "Preparing host",
  transfer: "Uploading artifacts",
  orchestrate: "Starting containers",
  verify: "Verifying deployment",
}

export interface DeploymentCoordinatorOptions {
  sessionFactory?: SessionFactory
  /** DNS reconciliation is skipped when absent */
  dns?: DnsReconciler | null
  hostPreparer?: HostPreparer
  transfer?: ArtifactTransfer
  orchestrator?: ContainerOrchestrator
  /** Pre-flight confirmation. Answering false cancels the run before any phase. */
  confirm?: (plan: DeployPlan) => boolean | Promise<boolean>
  logger?: Logger
  errorLogger?: ErrorLogger
}

interface PhaseResult {
  message: string
  skipped?: boolean
}

interface RunScope {
  handle: RunHandle
  request: DeployRequest
  logger: Logger
  session: RemoteSession | null
}

/**
 * Sequences connect → dns → host_prep → transfer → orchestrate → verify for
 * each run. Runs are independent; the registry is the only shared state.
 */
export class DeploymentCoordinator {
  private readonly registry = new RunRegistry()
  private readonly channel: EventChannel<DeployEvent>
  private readonly requests = new Map<string, DeployRequest>()

  private readonly sessionFactory: SessionFactory
  private readonly dns: DnsReconciler | null
  private readonly hostPreparer: HostPreparer
  private readonly transfer: ArtifactTransfer
  private readonly orchestrator: ContainerOrchestrator
  private readonly confirm?: (plan: DeployPlan) => boolean | Promise<boolean>
  private readonly logger: Logger
  private readonly customLogger?: Logger
  private readonly errorLogger: ErrorLogger

  constructor(options: DeploymentCoordinatorOptions = {}) {
    this.customLogger = options.logger
    this.logger = options.logger ?? createServiceLogger("Deploy")
    this.sessionFactory = options.sessionFactory ?? createSshSessionFactory()
    this.dns = options.dns ?? null
    this.orchestrator = options.orchestrator ?? new ContainerOrchestrator()
    this.hostPreparer = options.hostPreparer ?? new HostPreparer({ projectDir: this.orchestrator.projectDir })
    this.transfer = options.transfer ?? new ArtifactTransfer()
    this.confirm = options.confirm
    this.errorLogger = options.errorLogger ?? createErrorLogger()
    this.channel = new EventChannel<DeployEvent>({ logger: this.logger })
  }

  /**
   * Coordinator wired from the environment: ssh2 sessions with the
   * STACKSHIP_SSH_* login defaults and, when CLOUDFLARE_API_TOKEN is set,
   * Cloudflare DNS.
   */
  static fromEnv(
    options: Omit<DeploymentCoordinatorOptions, "dns"> & { dnsOptions?: DnsReconcilerOptions; env?: DeployEnv } = {},
  ): DeploymentCoordinator {
    const { dnsOptions, env, ...rest } = options
    const provider = createCloudflareProviderFromEnv(env)
    const credentials = createCredentialResolverFromEnv(env)
    return new DeploymentCoordinator({
      ...rest,
      sessionFactory: rest.sessionFactory ?? createSshSessionFactory({ credentials }),
      dns: provider ? new DnsReconciler(provider, dnsOptions) : null,
    })
  }

  // ===========================================================================
  // Run lifecycle
  // ===========================================================================

  /**
   * Register a queued run.
   *
   * @throws DeploymentError RUN_IN_PROGRESS when an active run targets the same domain
   */
  createRun(request: DeployRequest): DeploymentRun {
    const target = copyTarget({ ...request.target, domain: normalizeDomain(request.target.domain) })
    if (!target.domain || target.domain.includes("/") || target.domain.includes("..")) {
      throw DeploymentError.invalidTarget(`Invalid domain: ${request.target.domain}`)
    }
    if (isIP(target.address) === 0) {
      throw DeploymentError.invalidTarget(`Invalid address: ${target.address}`)
    }

    const check = this.registry.canAccept(target.domain)
    if (!check.allowed && check.activeRunId) {
      throw DeploymentError.runInProgress(target.domain, check.activeRunId)
    }

    // the pipeline reads this copy only, so later edits to the caller's request change nothing
    const owned: DeployRequest = {
      ...request,
      target,
      services: request.services.map(copyService),
      files: request.files ? [...request.files] : undefined,
    }

    const id = randomUUID()
    const machine = new RunStateMachine(
      { id, target: copyTarget(target), services: owned.services.map(copyService) },
      { logger: this.customLogger ?? createServiceLogger("StateMachine", id) },
    )
    const handle: RunHandle = { machine, abortController: new AbortController() }

    this.registry.insert(handle)
    this.requests.set(id, owned)
    this.emit(id, { type: "run_status", status: "queued", message: `Queued deployment of ${target.domain}` })
    return machine.snapshot()
  }

  /**
   * Confirm (when configured) and execute a queued run.
   * Resolves with the final snapshot; a failed phase does not reject.
   */
  async startRun(runId: string): Promise<DeploymentRun> {
    const handle = this.registry.get(runId)
    const request = this.requests.get(runId)
    if (!handle || !request) {
      throw DeploymentError.runNotFound(runId)
    }

    const { machine } = handle
    if (machine.currentState === "cancelled") {
      return machine.snapshot()
    }
    if (machine.currentState !== "queued") {
      throw DeploymentError.runAlreadyStarted(runId)
    }

    if (this.confirm) {
      const approved = await this.confirm(this.plan(runId, request))
      if (!approved) {
        this.cancelRun(runId, "Deployment was not confirmed")
        return machine.snapshot()
      }
    }

    await this.execute(handle, request)
    return machine.snapshot()
  }

  async deploy(request: DeployRequest): Promise<DeploymentRun> {
    const run = this.createRun(request)
    return this.startRun(run.id)
  }

  /**
   * Stop a run at the next phase boundary. Work already done stays in place.
   *
   * @returns false when the run is unknown or already finished
   */
  cancelRun(runId: string, reason = "Cancelled by request"): boolean {
    const handle = this.registry.get(runId)
    if (!handle) return false

    const { machine } = handle
    const phase = machine.currentContext.phase
    if (!machine.cancel()) return false

    handle.abortController.abort(new CancelledError(reason))
    this.emit(runId, { type: "run_status", status: "cancelled", message: reason, phase: phase ?? undefined })
    return true
  }

  getRun(runId: string): DeploymentRun | undefined {
    return this.registry.snapshot(runId)
  }

  listRuns(): DeploymentRun[] {
    return this.registry.list()
  }

  /**
   * Drop a finished run. Active runs are never evicted.
   */
  evictRun(runId: string): boolean {
    const evicted = this.registry.evict(runId)
    if (evicted) this.requests.delete(runId)
    return evicted
  }

  subscribe(listener: EventListener<DeployEvent>): () => void {
    return this.channel.subscribe(listener)
  }

  plan(runId: string, request: DeployRequest): DeployPlan {
    return {
      runId,
      target: request.target,
      services: request.services.map(service => service.name).sort(),
      dnsNames: this.dnsEnabled(request) ? desiredRecordNames(request.target.domain) : [],
      remoteDir: this.orchestrator.projectDir,
      phases: [...DEPLOY_PHASES],
    }
  }

  // ===========================================================================
  // Stack operations outside a run (each with its own session)
  // ===========================================================================

  async status(target: DeploymentTarget): Promise<string> {
    return this.withSession(target, session => this.orchestrator.status(session))
  }

  async logs(target: DeploymentTarget, options: LogOptions = {}): Promise<string> {
    return this.withSession(target, session => this.orchestrator.logs(session, options))
  }

  async stop(target: DeploymentTarget): Promise<void> {
    await this.withSession(target, session => this.orchestrator.stop(session))
  }

  async *followLogs(
    target: DeploymentTarget,
    options: { service?: string; signal: AbortSignal },
  ): AsyncIterable<string> {
    const session = await this.sessionFactory(target)
    try {
      yield* this.orchestrator.followLogs(session, options)
    } finally {
      await this.closeSession(session, this.logger)
    }
  }

  /**
   * Delete the app/site/api records of a domain.
   *
   * @returns number of records deleted (0 without a DNS provider)
   */
  async cleanupDns(domain: string): Promise<number> {
    if (!this.dns) {
      this.logger.warn("No DNS provider configured, nothing to clean up")
      return 0
    }
    return this.dns.cleanup(domain)
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  private async execute(handle: RunHandle, request: DeployRequest): Promise<void> {
    const { machine, abortController } = handle
    const runId = machine.currentContext.id
    const scope: RunScope = { handle, request, logger: this.loggerFor(runId), session: null }

    if (!machine.start()) return
    this.emit(runId, { type: "run_status", status: "running", message: `Deploying ${request.target.domain}` })

    try {
      for (const [index, phase] of DEPLOY_PHASES.entries()) {
        if (abortController.signal.aborted) return

        machine.enterPhase(phase)
        this.emit(runId, {
          type: "phase_start",
          phase,
          index: index + 1,
          total: DEPLOY_PHASES.length,
          message: PHASE_TITLES[phase],
        })

        const startedAt = Date.now()
        const result = await this.runPhase(phase, scope)
        machine.completePhase(phase)
        this.emit(runId, {
          type: "phase_complete",
          phase,
          durationMs: Date.now() - startedAt,
          skipped: result.skipped ?? false,
          message: result.message,
        })
      }

      if (abortController.signal.aborted) return
      if (machine.complete()) {
        this.emit(runId, { type: "run_status", status: "completed", message: `Deployed ${request.target.domain}` })
      }
    } catch (error) {
      const phase = machine.currentContext.phase ?? undefined
      // a cancelled run may still see its current phase fail on the abort
      if (!machine.fail(error)) {
        scope.logger.debug(`Ignoring error after ${machine.currentState}: ${errorMessage(error)}`)
        return
      }
      this.emit(runId, {
        type: "run_status",
        status: "failed",
        phase,
        errorCode: extractErrorCode(error),
        message: errorMessage(error),
      })
      await this.reportFailure(error, { runId, phase, domain: request.target.domain }, scope.logger)
    } finally {
      if (scope.session) {
        await this.closeSession(scope.session, scope.logger)
      }
    }
  }

  private async runPhase(phase: DeployPhase, scope: RunScope): Promise<PhaseResult> {
    const { request } = scope
    const { target, services } = request
    const { machine, abortController } = scope.handle
    const step = (message: string, level: StepLevel = "info") =>
      this.emit(machine.currentContext.id, { type: "step", phase, level, message })

    switch (phase) {
      case "connect": {
        scope.session = await this.sessionFactory(target)
        return { message: `Connected to ${target.address}` }
      }

      case "dns": {
        if (!this.dns) return { skipped: true, message: "no DNS provider configured" }
        if (!this.dnsEnabled(request)) return { skipped: true, message: "automatic DNS disabled" }

        let failed = 0
        const records = await this.dns.reconcile(target.domain, target.address, {
          signal: abortController.signal,
          onOutcome: outcome => {
            if (outcome.action === "failed") {
              failed++
              step(`${outcome.name}: failed (${errorMessage(outcome.error)})`, "warn")
            } else {
              step(`${outcome.name}: ${outcome.action}`)
            }
          },
        })
        machine.recordDns(records)

        if (request.verifyDns !== false) {
          const propagation = await this.dns.verifyPropagation(target.domain, target.address)
          for (const [name, ok] of Object.entries(propagation)) {
            if (!ok) step(`${name} does not resolve to ${target.address} yet`, "warn")
          }
        }

        const total = DNS.DESIRED_SUBDOMAINS.length
        return { message: `${records.length}/${total} records in desired state${failed ? `, ${failed} failed` : ""}` }
      }

      case "host_prep": {
        const result = await this.hostPreparer.prepare(requireSession(scope), target)
        if (result.dockerInstalled) step("Installed Docker")
        step(result.envCreated ? "Created secrets file" : "Kept existing secrets file")
        return { message: "Host ready" }
      }

      case "transfer": {
        const result = await this.transfer.upload(requireSession(scope), {
          directories: sourceDirectories(services),
          files: request.files,
          localRoot: request.localRoot,
          remoteRoot: this.orchestrator.projectDir,
        })
        for (const skipped of result.skipped) {
          step(`Skipped ${skipped}: not found locally`, "warn")
        }
        return { message: `Uploaded ${result.fileCount} files` }
      }

      case "orchestrate": {
        const session = requireSession(scope)
        await this.orchestrator.writeArtifacts(session, services, target)
        step("Wrote container manifest and edge config")
        await this.orchestrator.restart(session, abortController.signal)
        return { message: "Containers started" }
      }

      case "verify": {
        const report = await this.orchestrator.verify(requireSession(scope), target, services)
        machine.recordVerification(report)
        for (const warning of report.warnings) step(warning, "warn")
        for (const url of report.urls) step(url)
        return { message: report.healthy ? `Edge reports ${report.signal}` : "Deployed, edge not confirmed yet" }
      }
    }
  }

  /** Run-prefixed logger, unless the caller supplied one */
  private loggerFor(runId: string): Logger {
    return this.customLogger ?? createServiceLogger("Deploy", runId)
  }

  private dnsEnabled(request: DeployRequest): boolean {
    return this.dns !== null && request.autoDns !== false
  }

  private async reportFailure(error: unknown, context: ErrorLogContext, logger: Logger): Promise<void> {
    try {
      await this.errorLogger.error("Deployment failed", error, context)
    } catch (sinkError) {
      logger.error(`Error logger failed: ${errorMessage(sinkError)}`)
    }
  }

  private async withSession<T>(target: DeploymentTarget, fn: (session: RemoteSession) => Promise<T>): Promise<T> {
    const session = await this.sessionFactory(target)
    try {
      return await fn(session)
    } finally {
      await this.closeSession(session, this.logger)
    }
  }

  private async closeSession(session: RemoteSession, logger: Logger): Promise<void> {
    try {
      await session.close()
    } catch (error) {
      logger.warn(`Failed to close session to ${session.host}: ${errorMessage(error)}`)
    }
  }

  private emit(runId: string, event: DistributiveOmit<DeployEvent, "runId" | "timestamp">): void {
    const full: DeployEvent = { ...event, runId, timestamp: Date.now() }
    const logger = this.loggerFor(runId)
    if (full.type === "step" && full.level === "warn") {
      logger.warn(formatDeployEvent(full))
    } else {
      logger.info(formatDeployEvent(full))
    }
    this.channel.emit(full)
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

function requireSession(scope: RunScope): RemoteSession {
  if (!scope.session) {
    throw DeploymentError.generic("No remote session: connect phase did not run")
  }
  return scope.session
}

/** Build contexts and mount sources, deduplicated */
export function sourceDirectories(services: ServiceDescriptor[]): string[] {
  const dirs = new Set<string>()
  for (const service of services) {
    if (service.build) dirs.add(service.build)
    for (const mount of service.mounts ?? []) dirs.add(mount.source)
  }
  return [...dirs].sort()
}
