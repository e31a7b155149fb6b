import { posix } from "node:path"
import { createServiceLogger, type Logger } from "@stackship/logger"
import {
  DEFAULTS,
  inDirectory,
  PATHS,
  recordName,
  type ServiceDescriptor,
  shellCommand,
  sleepWithAbort,
} from "@stackship/shared"
import { OrchestrationError } from "../errors.js"
import { renderEdgeConfig } from "../render/caddy.js"
import { renderManifest } from "../render/compose.js"
import { validateServices } from "../render/validate.js"
import type { RemoteSession } from "../session/remote-session.js"
import type { DeploymentTarget, VerificationReport } from "../types.js"

export interface ContainerOrchestratorOptions {
  projectDir?: string
  /** Wait after `up` before the stack is inspected (default: DEFAULTS.CONTAINER_SETTLE_DELAY_MS) */
  settleDelayMs?: number
  logger?: Logger
}

export interface LogOptions {
  /** Limit to one service; all services when omitted */
  service?: string
  tail?: number
}

export interface RenderedArtifacts {
  manifest: string
  edgeConfig: string
}

const CERTIFICATE_SIGNAL = "certificate obtained successfully"
const SERVING_SIGNAL = "serving"

export const CERTIFICATE_PENDING_WARNING =
  "No certificate or serving signal in edge logs yet; certificates may still be issuing"

/**
 * Read the edge log for success signals. Best-effort: absence is a warning only.
 */
export function detectEdgeSignal(logText: string): VerificationReport["signal"] {
  const text = logText.toLowerCase()
  if (text.includes(CERTIFICATE_SIGNAL)) return "certificate_obtained"
  if (text.includes(SERVING_SIGNAL)) return "serving"
  return null
}

/**
 * Drives `docker compose` on the remote host for one stack.
 */
export class ContainerOrchestrator {
  readonly projectDir: string
  private readonly settleDelayMs: number
  private readonly logger: Logger

  constructor(options: ContainerOrchestratorOptions = {}) {
    this.projectDir = options.projectDir ?? PATHS.REMOTE_PROJECT_DIR
    this.settleDelayMs = options.settleDelayMs ?? DEFAULTS.CONTAINER_SETTLE_DELAY_MS
    this.logger = options.logger ?? createServiceLogger("Containers")
  }

  render(services: ServiceDescriptor[], target: DeploymentTarget): RenderedArtifacts {
    return {
      manifest: renderManifest(services, target),
      edgeConfig: renderEdgeConfig(services, target),
    }
  }

  /** Render both artifacts and write them into the project directory */
  async writeArtifacts(
    session: RemoteSession,
    services: ServiceDescriptor[],
    target: DeploymentTarget,
  ): Promise<RenderedArtifacts> {
    const artifacts = this.render(services, target)
    await session.writeFile(posix.join(this.projectDir, PATHS.MANIFEST_FILE), artifacts.manifest)
    await session.writeFile(posix.join(this.projectDir, PATHS.EDGE_CONFIG_FILE), artifacts.edgeConfig)
    this.logger.info(`Wrote ${PATHS.MANIFEST_FILE} and ${PATHS.EDGE_CONFIG_FILE}`)
    return artifacts
  }

  /**
   * Stop the running stack (failure ignored), start it again with a rebuild,
   * then wait for containers to settle. `signal` only cuts the settle wait short;
   * commands already sent run to completion.
   */
  async restart(session: RemoteSession, signal?: AbortSignal): Promise<void> {
    const down = await session.execute(this.compose("down"))
    if (down.exitCode !== 0) {
      this.logger.warn(`compose down exited with ${down.exitCode}, continuing`)
    }

    const up = await session.execute(this.compose("up", "-d", "--build"))
    if (up.exitCode !== 0) {
      throw new OrchestrationError(`Failed to start containers: ${up.stderr.trim() || `exit code ${up.exitCode}`}`, {
        exitCode: up.exitCode,
        stderr: up.stderr,
      })
    }
    this.logger.info("Containers started")

    if (this.settleDelayMs > 0) {
      await sleepWithAbort(this.settleDelayMs, signal)
    }
  }

  async verify(
    session: RemoteSession,
    target: DeploymentTarget,
    services: ServiceDescriptor[],
  ): Promise<VerificationReport> {
    const ps = await session.execute(this.compose("ps"))
    const edgeLogs = await session.execute(
      this.compose("logs", "--tail", String(DEFAULTS.VERIFY_LOG_TAIL), DEFAULTS.EDGE_SERVICE_NAME),
    )

    const edgeLogText = `${edgeLogs.stdout}${edgeLogs.stderr}`
    const signal = detectEdgeSignal(edgeLogText)
    const warnings: string[] = []
    if (ps.exitCode !== 0) {
      warnings.push(`compose ps exited with ${ps.exitCode}`)
    }
    if (!signal) {
      warnings.push(CERTIFICATE_PENDING_WARNING)
    }

    const urls = validateServices(services).routes.map(route => `https://${recordName(route.label, target.domain)}`)

    return {
      healthy: signal !== null,
      signal,
      statusText: ps.stdout,
      edgeLogText,
      warnings,
      urls,
    }
  }

  async status(session: RemoteSession): Promise<string> {
    const result = await session.execute(this.compose("ps"))
    if (result.exitCode !== 0) {
      throw new OrchestrationError(`Cannot read stack status: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
      })
    }
    return result.stdout
  }

  async stop(session: RemoteSession): Promise<void> {
    const result = await session.execute(this.compose("down"))
    if (result.exitCode !== 0) {
      throw new OrchestrationError(`Failed to stop containers: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
      })
    }
    this.logger.info("Containers stopped")
  }

  async logs(session: RemoteSession, options: LogOptions = {}): Promise<string> {
    const args = ["logs", "--tail", String(options.tail ?? 100)]
    if (options.service) args.push(options.service)

    const result = await session.execute(this.compose(...args))
    if (result.exitCode !== 0) {
      throw new OrchestrationError(`Cannot read logs: ${result.stderr.trim()}`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
      })
    }
    return result.stdout
  }

  /**
   * Follow logs until `signal` aborts. The signal is checked between chunks.
   */
  async *followLogs(
    session: RemoteSession,
    options: { service?: string; signal: AbortSignal },
  ): AsyncIterable<string> {
    const args = ["logs", "-f", "--tail", "0"]
    if (options.service) args.push(options.service)

    for await (const chunk of session.stream(this.compose(...args), options.signal)) {
      if (options.signal.aborted) return
      yield chunk
    }
  }

  private compose(...args: string[]): string {
    return inDirectory(this.projectDir, shellCommand("docker", "compose", "-f", PATHS.MANIFEST_FILE, ...args))
  }
}
