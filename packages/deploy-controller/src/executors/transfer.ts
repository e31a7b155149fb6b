import { stat } from "node:fs/promises"
import { posix } from "node:path"
import { createServiceLogger, type Logger } from "@stackship/logger"
import { errorMessage, extractErrorCode, resolveWithinRoot } from "@stackship/shared"
import { TransferError } from "../errors.js"
import type { RemoteSession } from "../session/remote-session.js"

export interface TransferPlan {
  /** Single files, relative to localRoot */
  files?: string[]
  /** Directory trees, relative to localRoot */
  directories?: string[]
  localRoot: string
  remoteRoot: string
}

export interface TransferResult {
  /** Relative paths copied (directories count once) */
  uploaded: string[]
  /** Relative paths that did not exist locally */
  skipped: string[]
  /** Number of individual files copied */
  fileCount: number
}

/**
 * Copies service sources and extra files to the remote project directory,
 * preserving relative structure. Re-running overwrites in place.
 */
export class ArtifactTransfer {
  private readonly logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createServiceLogger("Transfer")
  }

  async upload(session: RemoteSession, plan: TransferPlan): Promise<TransferResult> {
    const result: TransferResult = { uploaded: [], skipped: [], fileCount: 0 }
    const entries = [...(plan.directories ?? []), ...(plan.files ?? [])]

    await session.mkdir(plan.remoteRoot)

    for (const entry of entries) {
      const resolved = resolveWithinRoot(plan.localRoot, entry)
      if (!resolved.valid) {
        throw new TransferError(entry, resolved.error)
      }

      const kind = await this.localKind(resolved.absolutePath)
      if (kind === "missing") {
        this.logger.warn(`Skipping ${resolved.relativePath}: not found locally`)
        result.skipped.push(resolved.relativePath)
        continue
      }

      const remotePath = posix.join(plan.remoteRoot, resolved.relativePath)
      try {
        await this.ensureParents(session, plan.remoteRoot, resolved.relativePath)
        if (kind === "directory") {
          const copied = await session.uploadDirectory(resolved.absolutePath, remotePath)
          result.fileCount += copied
          this.logger.info(`Uploaded ${resolved.relativePath}/ (${copied} files)`)
        } else {
          await session.uploadFile(resolved.absolutePath, remotePath)
          result.fileCount++
          this.logger.info(`Uploaded ${resolved.relativePath}`)
        }
      } catch (error) {
        if (error instanceof TransferError) throw error
        throw new TransferError(
          resolved.relativePath,
          `Failed to upload ${resolved.relativePath}: ${errorMessage(error)}`,
          error,
        )
      }
      result.uploaded.push(resolved.relativePath)
    }

    return result
  }

  private async localKind(path: string): Promise<"missing" | "file" | "directory"> {
    try {
      const stats = await stat(path)
      return stats.isDirectory() ? "directory" : "file"
    } catch (error) {
      if (extractErrorCode(error) === "ENOENT") return "missing"
      throw new TransferError(path, `Cannot read ${path}: ${errorMessage(error)}`, error)
    }
  }

  /** mkdir each intermediate directory of `relativePath`, outermost first */
  private async ensureParents(session: RemoteSession, remoteRoot: string, relativePath: string): Promise<void> {
    const segments = relativePath.split("/").slice(0, -1)
    let current = remoteRoot
    for (const segment of segments) {
      current = posix.join(current, segment)
      await session.mkdir(current)
    }
  }
}
