/**
 * @stackship/shared
 *
 * Constants, schemas and small utilities used across all packages in the monorepo.
 *
 * @example
 * ```typescript
 * import { PATHS, DNS, recordName } from "@stackship/shared"
 *
 * const manifest = `${PATHS.REMOTE_PROJECT_DIR}/${PATHS.MANIFEST_FILE}` // "/opt/stackship/docker-compose.prod.yml"
 * const names = DNS.DESIRED_SUBDOMAINS.map(label => recordName(label, "example.com"))
 * ```
 */

export { DEFAULTS, DNS, normalizeDomain, PATHS, recordName, TIMEOUTS } from "./config.js"
export { errorMessage, extractErrorCode, isAbortError } from "./errors.js"
export { isPathWithinRoot, type RootedPath, resolveWithinRoot } from "./path-security.js"
export { inDirectory, pipe, quiet, shellCommand, shellQuote } from "./shell.js"
export { sleep, sleepWithAbort } from "./sleep.js"
export {
  defaultStackDefinition,
  parseStackDefinition,
  SERVICE_NAME_PATTERN,
  type ServiceDescriptor,
  type ServiceMount,
  type StackDefinition,
  type StackDefinitionInput,
  SUBDOMAIN_LABEL_PATTERN,
  stackDefinitionSchema,
  toServiceDescriptors,
} from "./stack-schema.js"
