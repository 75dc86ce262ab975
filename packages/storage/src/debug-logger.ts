/**
 * Debug logging that gates PHI-sensitive console output behind an environment flag.
 *
 * NEVER pass transcripts, histories or notes to debugLog. Use debugLogPHI for those;
 * it only prints in development with CLINICAL_DEBUG_LOGS=true.
 *
 * @example
 * debugLog("Extracting clinical fields:", transcript.length, "chars") // Safe: only logs length
 * debugLogPHI("Synthesized history:", history) // Gated: only in dev with flag enabled
 */

const isDevelopment = (): boolean => process.env.NODE_ENV === "development"

const isPHIDebugEnabled = (): boolean => process.env.CLINICAL_DEBUG_LOGS === "true"

/**
 * Non-PHI metadata: counts, ids, statuses. Development only.
 */
export function debugLog(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

export function debugLogPHI(...args: unknown[]): void {
  if (isDevelopment() && isPHIDebugEnabled()) {
    console.log("[PHI DEBUG]", ...args)
  }
}

// Always enabled regardless of debug flags.
export function debugError(...args: unknown[]): void {
  console.error(...args)
}

export function debugWarn(...args: unknown[]): void {
  console.warn(...args)
}
