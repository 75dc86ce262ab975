import { z } from "zod"
import type { CompletionClient } from "@llm"
import { debugError, debugLog, debugWarn } from "@storage/debug-logger"
import { isPipelineError, PipelineStageError } from "../../shared/src/error"
import type { ClinicalNote } from "./clinical-models/clinical-note"
import {
  parseMedicalRecord,
  type MedicalHistoryLoader,
  type PatientId,
  type StoredMedicalRecord,
} from "./clinical-models/medical-record"
import { extractClinicalFields } from "./extraction"
import { synthesizeHistory, type HistorySynthesisResult } from "./history-synthesis"

export const clinicalNoteRequestSchema = z.object({
  text: z
    .string({
      required_error: "Missing 'text' field in request body",
      invalid_type_error: "'text' must be a string",
    })
    .refine((value) => value.trim().length > 0, { message: "Text field cannot be empty" }),
  patient_id: z.union([z.string(), z.number()]).nullish(),
})

export type ClinicalNoteRequest = z.infer<typeof clinicalNoteRequestSchema>

export interface ClinicalNotePipelineDeps {
  completion: CompletionClient
  records?: MedicalHistoryLoader
}

export interface ClinicalNoteResult {
  note: ClinicalNote
  synthesis: HistorySynthesisResult
}

/**
 * Checks the entry-point payload. Raises `validation_error` before any
 * collaborator is touched.
 */
export function validateClinicalNoteRequest(input: unknown): ClinicalNoteRequest {
  const result = clinicalNoteRequestSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new PipelineStageError("validation_error", issue?.message ?? "Invalid clinical note request", false, {
      path: issue?.path ?? [],
    })
  }
  return result.data
}

async function loadStoredRecord(
  loader: MedicalHistoryLoader | undefined,
  patientId: PatientId | null | undefined,
): Promise<StoredMedicalRecord> {
  if (!loader || patientId === undefined || patientId === null) {
    return {}
  }

  try {
    // Loaders are external; their records get the same validation as the JSON store.
    return parseMedicalRecord(await loader.load(patientId))
  } catch (error) {
    debugWarn(
      "Could not load medical history, continuing without it:",
      error instanceof Error ? error.message : "unknown error",
    )
    return {}
  }
}

/**
 * Builds the clinical note for one dictation:
 * extraction (fatal on failure) → stored record (best effort) → history synthesis (degrades).
 */
export async function buildClinicalNote(request: unknown, deps: ClinicalNotePipelineDeps): Promise<ClinicalNoteResult> {
  const { text, patient_id } = validateClinicalNoteRequest(request)

  let extracted: ClinicalNote
  try {
    extracted = await extractClinicalFields(text, { completion: deps.completion })
  } catch (error) {
    debugError("Clinical note generation failed at extraction:", isPipelineError(error) ? error.code : "unknown_error")
    throw error
  }
  const record = await loadStoredRecord(deps.records, patient_id)
  const synthesis = await synthesizeHistory(extracted.history, record, { completion: deps.completion })

  debugLog(`Clinical note assembled (history synthesis: ${synthesis.status})`)

  return {
    note: { ...extracted, history: synthesis.history },
    synthesis,
  }
}
