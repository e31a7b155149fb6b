/**
 * Server-side environment validation
 *
 * @example
 * ```typescript
 * import { getEnv, loadEnvFile } from "@stackship/env/server"
 *
 * // Optional: explicitly load .env file (call once at app entry)
 * loadEnvFile()
 *
 * const token = getEnv().CLOUDFLARE_API_TOKEN
 * ```
 */

import { existsSync } from "node:fs"
import { join } from "node:path"
import { createEnv } from "@t3-oss/env-core"
import { config as loadDotenv } from "dotenv"
import { DEFAULTS } from "@stackship/shared"
import { SERVER_ENV_KEYS, serverSchema } from "./schema.js"

/**
 * Explicitly load environment file
 *
 * Looks for `.env.<name>` first, then `.env`, in `cwd`.
 * This is NOT called automatically on import (no side effects).
 *
 * @param nodeEnv - Environment name (defaults to NODE_ENV or "development")
 * @returns the loaded file path, or null if none was found
 */
export function loadEnvFile(nodeEnv?: string, cwd: string = process.cwd()): string | null {
  const envName = nodeEnv || process.env.NODE_ENV || "development"

  for (const candidate of [join(cwd, `.env.${envName}`), join(cwd, ".env")]) {
    if (existsSync(candidate)) {
      loadDotenv({ path: candidate })
      return candidate
    }
  }

  return null
}

/**
 * Validate a set of environment variables against the server schema.
 * Unrelated variables in `source` are ignored.
 */
export function createDeployEnv(source: Record<string, string | undefined> = process.env) {
  const runtimeEnv: Record<string, string | undefined> = {}
  for (const key of SERVER_ENV_KEYS) {
    runtimeEnv[key] = source[key]
  }

  return createEnv({
    server: serverSchema,
    runtimeEnv,
    emptyStringAsUndefined: true,

    /**
     * Custom error handling
     */
    onValidationError: error => {
      console.error("❌ Invalid environment variables:")
      console.error(error.flatten().fieldErrors)
      throw new Error("Invalid environment variables")
    },
  })
}

export type DeployEnv = ReturnType<typeof createDeployEnv>

let cached: DeployEnv | null = null

/**
 * Validated process environment. Validation runs on first access.
 */
export function getEnv(): DeployEnv {
  if (!cached) {
    cached = createDeployEnv()
  }
  return cached
}

/**
 * Drop the cached environment (tests, or after loadEnvFile).
 */
export function resetEnv(): void {
  cached = null
}

export interface CloudflareSettings {
  apiToken: string
  email?: string
  proxied: boolean
  ttl: number
}

/**
 * Cloudflare settings, or null when no API token is configured.
 */
export function getCloudflareSettings(env: DeployEnv = getEnv()): CloudflareSettings | null {
  if (!env.CLOUDFLARE_API_TOKEN) {
    return null
  }

  return {
    apiToken: env.CLOUDFLARE_API_TOKEN,
    email: env.CLOUDFLARE_EMAIL,
    proxied: env.CLOUDFLARE_PROXY_ENABLED ? env.CLOUDFLARE_PROXY_ENABLED === "true" : DEFAULTS.DNS_PROXIED,
    ttl: env.CLOUDFLARE_TTL ? Number.parseInt(env.CLOUDFLARE_TTL, 10) : DEFAULTS.DNS_TTL,
  }
}

export interface SshDefaults {
  user: string
  keyPath?: string
  password?: string
}

/**
 * SSH login defaults applied to targets that do not carry their own.
 */
export function getSshDefaults(env: DeployEnv = getEnv()): SshDefaults {
  return {
    user: env.STACKSHIP_SSH_USER ?? DEFAULTS.SSH_USER,
    keyPath: env.STACKSHIP_SSH_KEY_PATH,
    password: env.STACKSHIP_SSH_PASSWORD,
  }
}
