export type DeploymentErrorCode =
  | "CONNECTION_FAILED"
  | "AUTHENTICATION_FAILED"
  | "REMOTE_COMMAND_FAILED"
  | "REMOTE_COMMAND_TIMEOUT"
  | "ZONE_NOT_FOUND"
  | "DNS_PROVIDER_ERROR"
  | "TRANSFER_FAILED"
  | "MANIFEST_INVALID"
  | "ORCHESTRATION_FAILED"
  | "CANCELLED"
  | "RUN_IN_PROGRESS"
  | "RUN_NOT_FOUND"
  | "INVALID_TARGET"
  | "UNKNOWN"

export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode
  readonly statusCode: number

  constructor(code: DeploymentErrorCode, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "DeploymentError"
    this.code = code
    this.statusCode = statusCode
  }

  static runInProgress(domain: string, runId: string): DeploymentError {
    return new DeploymentError("RUN_IN_PROGRESS", `Run ${runId} is already deploying ${domain}`, 409)
  }

  static runAlreadyStarted(runId: string): DeploymentError {
    return new DeploymentError("RUN_IN_PROGRESS", `Run ${runId} was already started`, 409)
  }

  static runNotFound(runId: string): DeploymentError {
    return new DeploymentError("RUN_NOT_FOUND", `Unknown run: ${runId}`, 404)
  }

  static invalidTarget(message: string): DeploymentError {
    return new DeploymentError("INVALID_TARGET", message, 400)
  }

  /** Generic error for anything outside the taxonomy */
  static generic(message: string, cause?: unknown): DeploymentError {
    return new DeploymentError("UNKNOWN", message, 500, { cause })
  }
}

/** Host unreachable, refused, or the handshake timed out */
export class ConnectionError extends DeploymentError {
  readonly host: string

  constructor(host: string, message: string, cause?: unknown) {
    super("CONNECTION_FAILED", `Cannot connect to ${host}: ${message}`, 502, { cause })
    this.name = "ConnectionError"
    this.host = host
  }
}

export class AuthenticationError extends DeploymentError {
  constructor(message: string, cause?: unknown) {
    super("AUTHENTICATION_FAILED", message, 401, { cause })
    this.name = "AuthenticationError"
  }
}

/** The remote process could not be started. A non-zero exit is not this. */
export class RemoteCommandError extends DeploymentError {
  readonly command: string

  constructor(command: string, message: string, cause?: unknown) {
    super("REMOTE_COMMAND_FAILED", `Remote command failed to start (${command}): ${message}`, 502, { cause })
    this.name = "RemoteCommandError"
    this.command = command
  }
}

export class RemoteCommandTimeoutError extends DeploymentError {
  readonly command: string
  readonly timeoutMs: number

  constructor(command: string, timeoutMs: number) {
    super("REMOTE_COMMAND_TIMEOUT", `Remote command timed out after ${timeoutMs}ms: ${command}`, 504)
    this.name = "RemoteCommandTimeoutError"
    this.command = command
    this.timeoutMs = timeoutMs
  }
}

export class ZoneNotFoundError extends DeploymentError {
  readonly domain: string

  constructor(domain: string) {
    super("ZONE_NOT_FOUND", `No DNS zone found for ${domain}`, 404)
    this.name = "ZoneNotFoundError"
    this.domain = domain
  }
}

export class DNSProviderError extends DeploymentError {
  /** HTTP status returned by the provider, when there was a response */
  readonly httpStatus?: number

  constructor(message: string, options: { httpStatus?: number; cause?: unknown } = {}) {
    super("DNS_PROVIDER_ERROR", message, 502, { cause: options.cause })
    this.name = "DNSProviderError"
    this.httpStatus = options.httpStatus
  }
}

export class TransferError extends DeploymentError {
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super("TRANSFER_FAILED", message, 500, { cause })
    this.name = "TransferError"
    this.path = path
  }
}

export class ManifestRenderError extends DeploymentError {
  constructor(message: string) {
    super("MANIFEST_INVALID", message, 400)
    this.name = "ManifestRenderError"
  }
}

export class OrchestrationError extends DeploymentError {
  readonly exitCode?: number
  readonly stderr?: string

  constructor(message: string, details: { exitCode?: number; stderr?: string } = {}) {
    super("ORCHESTRATION_FAILED", message, 500)
    this.name = "OrchestrationError"
    this.exitCode = details.exitCode
    this.stderr = details.stderr
  }
}

export class CancelledError extends DeploymentError {
  constructor(message = "Run was cancelled") {
    super("CANCELLED", message, 499)
    this.name = "CancelledError"
  }
}

export function isDeploymentError(error: unknown): error is DeploymentError {
  return error instanceof DeploymentError
}
