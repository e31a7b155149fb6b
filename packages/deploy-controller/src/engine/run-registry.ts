/**
 * Run Registry
 *
 * The only state shared between runs. Keyed by run id, with explicit insert
 * and explicit evict; callers only ever see snapshots.
 */

import type { DeploymentRun } from "../types.js"
import type { RunStateMachine } from "./state-machine.js"

export interface RunHandle {
  machine: RunStateMachine
  abortController: AbortController
}

export class RunRegistry {
  private runs = new Map<string, RunHandle>()

  /**
   * Check if a new run may target this domain. One active run per domain.
   */
  canAccept(domain: string): { allowed: boolean; activeRunId?: string } {
    for (const [id, handle] of this.runs) {
      if (!handle.machine.isTerminal() && handle.machine.currentContext.target.domain === domain) {
        return { allowed: false, activeRunId: id }
      }
    }
    return { allowed: true }
  }

  insert(handle: RunHandle): void {
    const { id } = handle.machine.currentContext
    if (this.runs.has(id)) {
      throw new Error(`Run ${id} is already registered`)
    }
    this.runs.set(id, handle)
  }

  get(id: string): RunHandle | undefined {
    return this.runs.get(id)
  }

  snapshot(id: string): DeploymentRun | undefined {
    return this.runs.get(id)?.machine.snapshot()
  }

  list(): DeploymentRun[] {
    return [...this.runs.values()].map(handle => handle.machine.snapshot())
  }

  /**
   * Remove a completed/failed/cancelled run.
   *
   * @returns false when the run is unknown or still active
   */
  evict(id: string): boolean {
    const handle = this.runs.get(id)
    if (!handle || !handle.machine.isTerminal()) {
      return false
    }
    return this.runs.delete(id)
  }

  get size(): number {
    return this.runs.size
  }
}
