import { prompts, type CompletionClient } from "@llm"
import { debugLog, debugLogPHI } from "@storage/debug-logger"
import { PipelineStageError, toPipelineError } from "../../shared/src/error"
import { toExtractedFields, type ExtractedFields } from "./clinical-models/clinical-note"
import { parseJsonResponse } from "./json-response"

export interface ExtractionDeps {
  completion: CompletionClient
}

export const EXTRACTION_TEMPERATURE = 0.2
export const EXTRACTION_MAX_TOKENS = 1024

function extractionFailure(message: string, cause: unknown, recoverable: boolean): PipelineStageError {
  const normalized = toPipelineError(cause, { code: "extraction_error", message, recoverable })
  return new PipelineStageError("extraction_error", `${message}: ${normalized.message}`, recoverable, {
    stage: "extraction",
    cause: normalized,
  })
}

/**
 * First completion call: pulls the six clinical fields out of a raw transcript.
 * Request failures and unparseable responses are fatal `extraction_error`s.
 */
export async function extractClinicalFields(rawText: string, deps: ExtractionDeps): Promise<ExtractedFields> {
  const { completion } = deps
  const promptSet = prompts.clinicalHistory.currentVersion

  debugLog(`Extracting clinical fields (${rawText.length} chars) with ${completion.provider}/${completion.model}`)

  let responseText: string
  try {
    responseText = await completion.complete({
      system: promptSet.getExtractionSystemPrompt(),
      prompt: rawText,
      responseFormat: "json_object",
      jsonSchema: {
        name: "ClinicalFields",
        schema: promptSet.EXTRACTED_FIELDS_SCHEMA,
      },
      temperature: EXTRACTION_TEMPERATURE,
      maxTokens: EXTRACTION_MAX_TOKENS,
    })
  } catch (error) {
    if (error instanceof PipelineStageError && error.code === "configuration_error") {
      throw error
    }
    const recoverable = error instanceof PipelineStageError ? error.recoverable : true
    throw extractionFailure("Clinical field extraction request failed", error, recoverable)
  }

  let candidate: Record<string, unknown>
  try {
    candidate = parseJsonResponse(responseText)
  } catch (error) {
    debugLogPHI("Unparseable extraction response:", responseText)
    throw extractionFailure("Extraction response could not be parsed as JSON", error, false)
  }

  return toExtractedFields(candidate)
}
