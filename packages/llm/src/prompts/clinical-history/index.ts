/**
 * Clinical History Prompt Exports
 * Central location for managing prompt versions
 */

import * as v1 from "./v1"

// Default to latest version
export const currentVersion = v1

export { v1 }

export type { HistorySynthesisPromptParams } from "./v1"
