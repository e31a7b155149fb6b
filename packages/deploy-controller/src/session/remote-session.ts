import { readdir } from "node:fs/promises"
import { join, posix } from "node:path"
import { errorMessage } from "@stackship/shared"
import { TransferError } from "../errors.js"
import type { CommandResult, DeploymentTarget, ExecuteOptions } from "../types.js"

/**
 * One authenticated command and transfer channel to one host.
 * Owned by a single run and released with `close()` on every exit path.
 */
export interface RemoteSession {
  readonly host: string

  /** Run a command to completion. A non-zero exit code is returned, not thrown. */
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>

  /** Long-lived output (e.g. `logs -f`). Ends when the command exits or `signal` aborts. */
  stream(command: string, signal: AbortSignal): AsyncIterable<string>

  uploadFile(localPath: string, remotePath: string): Promise<void>

  writeFile(remotePath: string, content: string): Promise<void>

  /** Create a directory. An existing directory is not an error. */
  mkdir(remotePath: string): Promise<void>

  /** Copy a directory tree, creating remote directories depth-first. Returns the number of files copied. */
  uploadDirectory(localDir: string, remoteDir: string): Promise<number>

  close(): Promise<void>
}

export type SessionFactory = (target: DeploymentTarget) => Promise<RemoteSession>

/**
 * Shared directory handling for session transports.
 * Subclasses supply the raw primitives.
 */
export abstract class BaseRemoteSession implements RemoteSession {
  abstract readonly host: string

  abstract execute(command: string, options?: ExecuteOptions): Promise<CommandResult>
  abstract stream(command: string, signal: AbortSignal): AsyncIterable<string>
  abstract uploadFile(localPath: string, remotePath: string): Promise<void>
  abstract writeFile(remotePath: string, content: string): Promise<void>
  abstract close(): Promise<void>

  /** Create exactly one directory level; may fail if it exists. */
  protected abstract createDirectory(remotePath: string): Promise<void>

  protected abstract isDirectory(remotePath: string): Promise<boolean>

  async mkdir(remotePath: string): Promise<void> {
    try {
      await this.createDirectory(remotePath)
    } catch (error) {
      // already exists
      if (await this.isDirectory(remotePath)) {
        return
      }
      throw new TransferError(remotePath, `Cannot create remote directory ${remotePath}: ${errorMessage(error)}`, error)
    }
  }

  async uploadDirectory(localDir: string, remoteDir: string): Promise<number> {
    await this.mkdir(remoteDir)

    const entries = await readdir(localDir, { withFileTypes: true })
    entries.sort((a, b) => a.name.localeCompare(b.name))

    let copied = 0
    for (const entry of entries) {
      const localPath = join(localDir, entry.name)
      const remotePath = posix.join(remoteDir, entry.name)

      if (entry.isDirectory()) {
        copied += await this.uploadDirectory(localPath, remotePath)
      } else if (entry.isFile()) {
        await this.uploadFile(localPath, remotePath)
        copied++
      }
      // symlinks, sockets and devices are not copied
    }
    return copied
  }
}
