/**
 * @stackship/deploy-events
 *
 * Progress-event contract for deployment runs.
 *
 * Usage:
 * ```typescript
 * import { type DeployEvent, formatDeployEvent, isDeployEvent } from "@stackship/deploy-events"
 * ```
 */

export * from "./events.js"
