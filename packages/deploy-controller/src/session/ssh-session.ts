import { StringDecoder } from "node:string_decoder"
import { createServiceLogger, type Logger } from "@stackship/logger"
import { DEFAULTS, errorMessage, TIMEOUTS } from "@stackship/shared"
import { Client, type ClientChannel, type ConnectConfig, type SFTPWrapper } from "ssh2"
import {
  AuthenticationError,
  CancelledError,
  ConnectionError,
  RemoteCommandError,
  RemoteCommandTimeoutError,
} from "../errors.js"
import type { CommandResult, DeploymentTarget, ExecuteOptions } from "../types.js"
import { type CredentialResolver, DefaultCredentialResolver } from "./credentials.js"
import { BaseRemoteSession, type SessionFactory } from "./remote-session.js"

export interface SshSessionOptions {
  credentials?: CredentialResolver
  /** Handshake timeout (default: TIMEOUTS.SSH_CONNECT_MS) */
  readyTimeoutMs?: number
  logger?: Logger
}

/**
 * RemoteSession over ssh2: commands on exec channels, files over SFTP.
 */
export class SshSession extends BaseRemoteSession {
  private sftpPromise: Promise<SFTPWrapper> | null = null
  private closed = false

  private constructor(
    private readonly client: Client,
    readonly host: string,
    private readonly logger: Logger,
  ) {
    super()
  }

  /**
   * Open and authenticate a session. No automatic retry.
   *
   * @throws AuthenticationError when the server rejects the credentials
   * @throws ConnectionError when the host is unreachable or the handshake times out
   */
  static async connect(target: DeploymentTarget, options: SshSessionOptions = {}): Promise<SshSession> {
    const credentials = await (options.credentials ?? new DefaultCredentialResolver()).resolve(target)
    const logger = options.logger ?? createServiceLogger("SSH", target.address)

    const config: ConnectConfig = {
      host: target.address,
      port: target.port ?? DEFAULTS.SSH_PORT,
      username: credentials.username,
      privateKey: credentials.privateKey,
      passphrase: credentials.passphrase,
      password: credentials.password,
      readyTimeout: options.readyTimeoutMs ?? TIMEOUTS.SSH_CONNECT_MS,
    }

    const client = new Client()
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error & { level?: string }) => {
        client.end()
        if (error.level === "client-authentication") {
          reject(new AuthenticationError(`Authentication failed for ${credentials.username}@${target.address}`, error))
        } else {
          reject(new ConnectionError(target.address, error.message, error))
        }
      }
      client.once("ready", () => {
        client.removeListener("error", onError)
        resolve()
      })
      client.once("error", onError)
      client.connect(config)
    })
    // after the handshake, failures reach callers through their channels
    client.on("error", error => logger.error("Connection error:", error.message))

    logger.info(`Connected as ${credentials.username}`)
    return new SshSession(client, target.address, logger)
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const timeoutMs = options.timeoutMs ?? TIMEOUTS.REMOTE_COMMAND_MS
    const { signal } = options
    if (signal?.aborted) {
      throw new CancelledError("Remote command aborted before start")
    }

    this.logger.debug("exec", command)
    const channel = await this.openChannel(command)

    return new Promise<CommandResult>((resolve, reject) => {
      const stdout: Buffer[] = []
      const stderr: Buffer[] = []
      let exitCode: number | null = null
      let settled = false

      const finish = (outcome: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        signal?.removeEventListener("abort", onAbort)
        outcome()
      }

      const timer = setTimeout(() => {
        finish(() => reject(new RemoteCommandTimeoutError(command, timeoutMs)))
        channel.close()
      }, timeoutMs)

      const onAbort = () => {
        finish(() => reject(new CancelledError("Remote command aborted")))
        channel.close()
      }
      signal?.addEventListener("abort", onAbort, { once: true })
      // aborted while the channel was opening
      if (signal?.aborted) onAbort()

      // multibyte characters may straddle packets, so decode once at the end
      channel.on("data", (chunk: Buffer) => {
        stdout.push(chunk)
      })
      channel.stderr.on("data", (chunk: Buffer) => {
        stderr.push(chunk)
      })
      channel.on("exit", (code: number | null) => {
        exitCode = code
      })
      channel.on("close", () => {
        // killed by signal: no exit code, report as failure
        finish(() =>
          resolve({
            stdout: Buffer.concat(stdout).toString("utf8"),
            stderr: Buffer.concat(stderr).toString("utf8"),
            exitCode: exitCode ?? 255,
          }),
        )
      })
    })
  }

  async *stream(command: string, signal: AbortSignal): AsyncIterable<string> {
    if (signal.aborted) return

    const channel = await this.openChannel(command)
    const pending: string[] = []
    let ended = false
    let wake: (() => void) | null = null

    const notify = () => {
      const resume = wake
      wake = null
      resume?.()
    }
    const push = (text: string) => {
      if (text) pending.push(text)
      notify()
    }
    const stdout = new StringDecoder("utf8")
    const stderr = new StringDecoder("utf8")

    channel.on("data", (chunk: Buffer) => push(stdout.write(chunk)))
    channel.stderr.on("data", (chunk: Buffer) => push(stderr.write(chunk)))
    channel.on("close", () => {
      ended = true
      push(stdout.end() + stderr.end())
    })
    signal.addEventListener("abort", notify, { once: true })

    try {
      while (!signal.aborted) {
        const chunk = pending.shift()
        if (chunk !== undefined) {
          yield chunk
        } else if (ended) {
          return
        } else {
          await new Promise<void>(resolve => {
            wake = resolve
          })
        }
      }
    } finally {
      signal.removeEventListener("abort", notify)
      if (!ended) channel.close()
    }
  }

  async uploadFile(localPath: string, remotePath: string): Promise<void> {
    const sftp = await this.getSftp()
    await new Promise<void>((resolve, reject) => {
      sftp.fastPut(localPath, remotePath, error => (error ? reject(error) : resolve()))
    })
  }

  async writeFile(remotePath: string, content: string): Promise<void> {
    const sftp = await this.getSftp()
    await new Promise<void>((resolve, reject) => {
      sftp.writeFile(remotePath, content, error => (error ? reject(error) : resolve()))
    })
  }

  protected async createDirectory(remotePath: string): Promise<void> {
    const sftp = await this.getSftp()
    await new Promise<void>((resolve, reject) => {
      sftp.mkdir(remotePath, error => (error ? reject(error) : resolve()))
    })
  }

  protected async isDirectory(remotePath: string): Promise<boolean> {
    const sftp = await this.getSftp()
    return new Promise<boolean>(resolve => {
      sftp.stat(remotePath, (error, stats) => resolve(!error && stats.isDirectory()))
    })
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    if (this.sftpPromise) {
      try {
        const sftp = await this.sftpPromise
        sftp.end()
      } catch (error) {
        this.logger.warn("SFTP channel was never opened:", errorMessage(error))
      }
    }
    this.client.end()
    this.logger.info("Session closed")
  }

  private openChannel(command: string): Promise<ClientChannel> {
    return new Promise<ClientChannel>((resolve, reject) => {
      this.client.exec(command, (error, channel) => {
        if (error) {
          reject(new RemoteCommandError(command, error.message, error))
        } else {
          resolve(channel)
        }
      })
    })
  }

  private getSftp(): Promise<SFTPWrapper> {
    if (!this.sftpPromise) {
      this.sftpPromise = new Promise<SFTPWrapper>((resolve, reject) => {
        this.client.sftp((error, sftp) => (error ? reject(error) : resolve(sftp)))
      })
    }
    return this.sftpPromise
  }
}

/**
 * Session factory used by the coordinator unless tests inject their own.
 */
export function createSshSessionFactory(options: SshSessionOptions = {}): SessionFactory {
  return target => SshSession.connect(target, options)
}
