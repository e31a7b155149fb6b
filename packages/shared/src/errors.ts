/**
 * Error classification helpers.
 *
 * SSH, HTTP and filesystem layers all report failures as loosely-typed
 * errors with a `code` or an abort name. These helpers read
 * those shapes without assuming a concrete class.
 */

/**
 * Extract a string error code (`ENOENT`, `ECONNREFUSED`, ...) from an error.
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}

/**
 * Checks if an error is an AbortError or a timeout raised by an AbortSignal.
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== "object") {
    return false
  }
  const name = "name" in err ? String(err.name) : ""
  return name === "AbortError" || name === "TimeoutError"
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
