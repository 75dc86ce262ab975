import { isPlainObject } from "./clinical-models/schema-defaults"
import { PipelineStageError } from "../../shared/src/error"

/**
 * Drops one leading fence line (```json or ```) and one trailing ``` marker.
 */
export function stripMarkdownFences(text: string): string {
  let cleaned = text.trim()

  if (cleaned.startsWith("```")) {
    const firstNewline = cleaned.indexOf("\n")
    cleaned = firstNewline === -1 ? "" : cleaned.slice(firstNewline + 1)
  }

  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, cleaned.lastIndexOf("```"))
  }

  return cleaned.trim()
}

/**
 * Parses a model response as a JSON object. Fences are only stripped when the
 * raw text fails to parse; a second failure is final.
 */
export function parseJsonResponse(text: string): Record<string, unknown> {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    parsed = JSON.parse(stripMarkdownFences(text))
  }

  if (!isPlainObject(parsed)) {
    throw new PipelineStageError("invalid_shape", "Model response is valid JSON but not an object", false)
  }

  return parsed
}
