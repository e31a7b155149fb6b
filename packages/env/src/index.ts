/**
 * @stackship/env
 *
 * Centralized environment variable validation using @t3-oss/env-core
 *
 * ## Usage
 *
 * ### Runtime access
 * ```typescript
 * import { getEnv, getCloudflareSettings } from "@stackship/env/server"
 *
 * const level = getEnv().LOG_LEVEL
 * const cloudflare = getCloudflareSettings()
 * ```
 *
 * ### Schemas only (tests, docs)
 * ```typescript
 * import { serverSchema } from "@stackship/env"
 * ```
 */

// Export ONLY schemas - no env object, no side effects
export { booleanString, logLevel, positiveIntString, SERVER_ENV_KEYS, serverSchema } from "./schema.js"
