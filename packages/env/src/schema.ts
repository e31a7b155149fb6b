/**
 * Pure Zod schemas for environment variable validation
 *
 * This file contains ONLY schema definitions - no runtime code, no side effects.
 * Safe to import anywhere (server, tests).
 */

import { z } from "zod"

/**
 * Custom validators for common patterns
 *
 * IMPORTANT: Do NOT use .refine() or .transform() here — they wrap the schema
 * in ZodEffects, which loses the string input type in @t3-oss/env-core.
 * Parse booleans and numbers in the accessor functions instead.
 */
export const booleanString = z.enum(["true", "false"])

export const positiveIntString = z.string().regex(/^[1-9]\d*$/, "Must be a positive integer")

export const logLevel = z.enum(["debug", "info", "warn", "error"])

/**
 * Server-side environment variables schema
 */
export const serverSchema = {
  // Cloudflare DNS (optional - DNS reconciliation is skipped without a token)
  CLOUDFLARE_API_TOKEN: z.string().min(1).optional(),
  CLOUDFLARE_EMAIL: z.string().email().optional(),
  CLOUDFLARE_PROXY_ENABLED: booleanString.optional(),
  CLOUDFLARE_TTL: positiveIntString.optional(),

  // SSH defaults for deployment targets
  STACKSHIP_SSH_USER: z.string().min(1).optional(),
  STACKSHIP_SSH_KEY_PATH: z.string().min(1).optional(),
  STACKSHIP_SSH_PASSWORD: z.string().min(1).optional(),

  // Remote layout
  STACKSHIP_REMOTE_DIR: z.string().regex(/^\//, "Must be an absolute path").optional(),

  // Logging
  LOG_LEVEL: logLevel.optional(),
}

export const SERVER_ENV_KEYS = Object.keys(serverSchema) as (keyof typeof serverSchema)[]
