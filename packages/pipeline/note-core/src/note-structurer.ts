import { prompts, type CompletionClient } from "@llm"
import { debugLog } from "@storage/debug-logger"
import { PipelineStageError, toPipelineError } from "../../shared/src/error"
import { CLINICAL_NOTE_SCHEMA, normalize } from "./clinical-models/schema-defaults"
import { parseJsonResponse } from "./json-response"

export interface NoteStructurerDeps {
  completion: CompletionClient
}

export const STRUCTURER_TEMPERATURE = 0.2
export const STRUCTURER_MAX_TOKENS = 2048

/**
 * Corrects a raw dictation and maps it onto the full consultation form.
 * The result always carries every CLINICAL_NOTE_SCHEMA key; extra keys the
 * model adds are kept.
 */
export async function structureClinicalNote(rawText: string, deps: NoteStructurerDeps): Promise<Record<string, unknown>> {
  if (!rawText || rawText.trim().length === 0) {
    throw new PipelineStageError("validation_error", "Text field cannot be empty", false)
  }

  const system = prompts.clinicalHistory.currentVersion.getNoteStructurerSystemPrompt(
    JSON.stringify(CLINICAL_NOTE_SCHEMA, null, 2),
  )

  debugLog(`Structuring dictation (${rawText.length} chars)`)

  try {
    const responseText = await deps.completion.complete({
      system,
      prompt: rawText,
      responseFormat: "json_object",
      temperature: STRUCTURER_TEMPERATURE,
      maxTokens: STRUCTURER_MAX_TOKENS,
    })
    return normalize(CLINICAL_NOTE_SCHEMA, parseJsonResponse(responseText))
  } catch (error) {
    if (error instanceof PipelineStageError && error.code === "configuration_error") {
      throw error
    }
    const cause = toPipelineError(error, {
      code: "extraction_error",
      message: "Structuring failed",
      recoverable: false,
    })
    throw new PipelineStageError("extraction_error", `Failed to structure clinical note: ${cause.message}`, false, {
      stage: "structurer",
      cause,
    })
  }
}
