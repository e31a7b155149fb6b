import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import { join } from "node:path"
import { type DeployEnv, getSshDefaults, type SshDefaults } from "@stackship/env/server"
import { DEFAULTS, errorMessage } from "@stackship/shared"
import { AuthenticationError } from "../errors.js"
import type { DeploymentTarget } from "../types.js"

export interface ResolvedCredentials {
  username: string
  privateKey?: Buffer
  passphrase?: string
  password?: string
}

/**
 * Turns a target's auth description into material the transport can use.
 */
export interface CredentialResolver {
  resolve(target: DeploymentTarget): Promise<ResolvedCredentials>
}

export interface DefaultCredentialResolverOptions {
  /**
   * Asked for a password when the target uses interactive auth.
   * Without it, interactive targets fail instead of blocking.
   */
  promptPassword?: (target: DeploymentTarget) => Promise<string>
  readKey?: (path: string) => Promise<Buffer>
  /**
   * Login user for targets without one, and the key or password tried for
   * interactive targets before the prompt (see `getSshDefaults`).
   */
  defaults?: Partial<SshDefaults>
}

export function expandHome(path: string): string {
  if (path === "~") return homedir()
  if (path.startsWith("~/")) return join(homedir(), path.slice(2))
  return path
}

export class DefaultCredentialResolver implements CredentialResolver {
  private readonly promptPassword?: (target: DeploymentTarget) => Promise<string>
  private readonly readKey: (path: string) => Promise<Buffer>
  private readonly defaults: Partial<SshDefaults>

  constructor(options: DefaultCredentialResolverOptions = {}) {
    this.promptPassword = options.promptPassword
    this.readKey = options.readKey ?? (path => readFile(path))
    this.defaults = options.defaults ?? {}
  }

  async resolve(target: DeploymentTarget): Promise<ResolvedCredentials> {
    const username = target.user ?? this.defaults.user ?? DEFAULTS.SSH_USER
    const { auth } = target

    switch (auth.kind) {
      case "privateKey":
        return { username, ...(await this.loadKey(auth.path)), passphrase: auth.passphrase }

      case "password":
        return { username, password: auth.password }

      case "interactive": {
        if (this.defaults.keyPath) {
          return { username, ...(await this.loadKey(this.defaults.keyPath)) }
        }
        if (this.defaults.password) {
          return { username, password: this.defaults.password }
        }
        if (!this.promptPassword) {
          throw new AuthenticationError(`Interactive authentication for ${target.address} needs a password prompt`)
        }
        const password = await this.promptPassword(target)
        if (!password) {
          throw new AuthenticationError(`No password supplied for ${username}@${target.address}`)
        }
        return { username, password }
      }
    }
  }

  private async loadKey(path: string): Promise<{ privateKey: Buffer }> {
    const keyPath = expandHome(path)
    try {
      return { privateKey: await this.readKey(keyPath) }
    } catch (error) {
      throw new AuthenticationError(`Cannot read private key at ${keyPath}: ${errorMessage(error)}`, error)
    }
  }
}

/**
 * Resolver with STACKSHIP_SSH_USER, STACKSHIP_SSH_KEY_PATH and
 * STACKSHIP_SSH_PASSWORD as defaults.
 */
export function createCredentialResolverFromEnv(
  env?: DeployEnv,
  options: Omit<DefaultCredentialResolverOptions, "defaults"> = {},
): DefaultCredentialResolver {
  return new DefaultCredentialResolver({ ...options, defaults: getSshDefaults(env) })
}
