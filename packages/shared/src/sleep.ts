/**
 * Resolve after `ms` milliseconds. Non-positive delays resolve immediately.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Sleep with abort signal support.
 * Rejects with the signal's reason when aborted before the delay elapses.
 */
export async function sleepWithAbort(ms: number, abortSignal?: AbortSignal): Promise<void> {
  if (!abortSignal) {
    return sleep(ms)
  }
  if (abortSignal.aborted) {
    throw abortReason(abortSignal)
  }
  if (ms <= 0) {
    return
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timeout)
      reject(abortReason(abortSignal))
    }
    const timeout = setTimeout(() => {
      abortSignal.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    abortSignal.addEventListener("abort", onAbort, { once: true })
  })
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("aborted")
}
