import { randomInt } from "node:crypto"
import { posix } from "node:path"
import { createServiceLogger, type Logger } from "@stackship/logger"
import { DEFAULTS, PATHS, pipe, quiet, shellCommand } from "@stackship/shared"
import { OrchestrationError, TransferError } from "../errors.js"
import type { RemoteSession } from "../session/remote-session.js"
import type { DeploymentTarget } from "../types.js"

const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789"

export function generateSecret(length: number = DEFAULTS.DB_PASSWORD_LENGTH): string {
  let secret = ""
  for (let i = 0; i < length; i++) {
    secret += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)]
  }
  return secret
}

export function renderEnvFile(target: DeploymentTarget, dbPassword: string): string {
  return [`DOMAIN=${target.domain}`, `DB_PASSWORD=${dbPassword}`, "APP_ENV=production", ""].join("\n")
}

export interface HostPrepResult {
  dockerInstalled: boolean
  envCreated: boolean
}

/**
 * Makes a fresh host ready for the stack: container runtime, project
 * directory and a secrets file that survives re-deploys.
 */
export class HostPreparer {
  readonly projectDir: string
  private readonly logger: Logger
  private readonly secret: () => string

  constructor(options: { projectDir?: string; logger?: Logger; secret?: () => string } = {}) {
    this.projectDir = options.projectDir ?? PATHS.REMOTE_PROJECT_DIR
    this.logger = options.logger ?? createServiceLogger("HostPrep")
    this.secret = options.secret ?? (() => generateSecret())
  }

  async prepare(session: RemoteSession, target: DeploymentTarget): Promise<HostPrepResult> {
    const dockerInstalled = await this.ensureDocker(session)

    const mkdir = await session.execute(shellCommand("mkdir", "-p", this.projectDir))
    if (mkdir.exitCode !== 0) {
      throw new TransferError(this.projectDir, `Cannot create ${this.projectDir}: ${mkdir.stderr.trim()}`)
    }

    const envPath = posix.join(this.projectDir, PATHS.ENV_FILE)
    const exists = await session.execute(shellCommand("test", "-f", envPath))
    if (exists.exitCode === 0) {
      this.logger.info(`${envPath} exists, keeping current secrets`)
      return { dockerInstalled, envCreated: false }
    }

    await session.writeFile(envPath, renderEnvFile(target, this.secret()))
    this.logger.info(`Wrote ${envPath}`)
    return { dockerInstalled, envCreated: true }
  }

  /** @returns true when docker had to be installed */
  private async ensureDocker(session: RemoteSession): Promise<boolean> {
    let installed = false

    const probe = await session.execute(quiet("command -v docker"))
    if (probe.exitCode !== 0) {
      this.logger.info("Docker not found, installing")
      const install = await session.execute(pipe(shellCommand("curl", "-fsSL", DEFAULTS.DOCKER_INSTALL_URL), "sh"))
      if (install.exitCode !== 0) {
        throw new OrchestrationError(`Docker installation failed on ${session.host}`, {
          exitCode: install.exitCode,
          stderr: install.stderr,
        })
      }
      installed = true
    }

    const compose = await session.execute(shellCommand("docker", "compose", "version"))
    if (compose.exitCode !== 0) {
      throw new OrchestrationError(`Docker Compose is not available on ${session.host}`, {
        exitCode: compose.exitCode,
        stderr: compose.stderr,
      })
    }
    return installed
  }
}
