import { debugLog } from "@storage/debug-logger"
import { PipelineStageError } from "./error"

const LOCAL_HOSTNAMES = new Set(["localhost", "127.0.0.1", "::1", "[::1]"])

/**
 * HIPAA: PHI must be encrypted in transit. Remote endpoints must use HTTPS;
 * localhost is allowed since data never leaves the machine.
 */
export function assertSecureEndpoint(url: string, serviceName: string): void {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new PipelineStageError("configuration_error", `Invalid ${serviceName} URL: ${url}`, false)
  }

  if (!LOCAL_HOSTNAMES.has(parsed.hostname) && parsed.protocol !== "https:") {
    throw new PipelineStageError(
      "configuration_error",
      `SECURITY ERROR: ${serviceName} endpoint must use HTTPS or localhost. ` +
        `Received: ${parsed.protocol}//${parsed.host}`,
      false,
    )
  }
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl
}

/**
 * Runs `fetchFn` and `readResponse` under one abort timer, so a body that
 * stalls after the headers arrive times out like a hung connection.
 * Timeouts surface as `timeout_error`, connection failures as `network_error`.
 */
export async function fetchWithTimeout<T>(
  fetchFn: typeof fetch,
  url: string,
  init: RequestInit,
  options: { timeoutMs: number; serviceName: string; provider: string },
  readResponse: (response: Response) => Promise<T>,
): Promise<T> {
  const { timeoutMs, serviceName, provider } = options
  const controller = new AbortController()
  let timeout: NodeJS.Timeout | undefined
  const expired = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      controller.abort()
      reject(new Error(`${serviceName} timed out`))
    }, timeoutMs)
  })

  const request = (async () => readResponse(await fetchFn(url, { ...init, signal: controller.signal })))()
  // The request is abandoned once the timer fires; it may still settle later.
  request.catch((error: unknown) => {
    if (controller.signal.aborted) {
      debugLog(`${serviceName} request settled after timeout:`, error instanceof Error ? error.name : typeof error)
    }
  })

  try {
    return await Promise.race([request, expired])
  } catch (error) {
    if (controller.signal.aborted) {
      throw new PipelineStageError("timeout_error", `${serviceName} did not respond within ${timeoutMs}ms`, true, {
        provider,
        timeoutMs,
      })
    }
    if (error instanceof TypeError) {
      throw new PipelineStageError("network_error", `Cannot connect to ${serviceName} at ${url}: ${error.message}`, true, {
        provider,
      })
    }
    throw error
  } finally {
    clearTimeout(timeout)
  }
}
