import { normalize, type JsonObject } from "./schema-defaults"

export interface ExtractedFields {
  chief_complaint: string
  history: string
  examination: string
  diagnosis: string
  plan: string
  additional_observations: string
}

/**
 * Final note: the extracted fields with `history` replaced by the synthesized summary.
 */
export type ClinicalNote = ExtractedFields

export const EXTRACTED_FIELD_KEYS = [
  "chief_complaint",
  "history",
  "examination",
  "diagnosis",
  "plan",
  "additional_observations",
] as const satisfies ReadonlyArray<keyof ExtractedFields>

export const EMPTY_NOTE: ClinicalNote = {
  chief_complaint: "",
  history: "",
  examination: "",
  diagnosis: "",
  plan: "",
  additional_observations: "",
}

const EXTRACTED_FIELD_DEFAULTS: JsonObject = { ...EMPTY_NOTE }

function toFieldText(value: unknown): string {
  if (typeof value === "string") return value
  if (value === null || value === undefined) return ""
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  if (Array.isArray(value)) return value.map(toFieldText).filter((item) => item.length > 0).join("\n")
  return JSON.stringify(value)
}

/**
 * Default-fills the six extraction fields from a parsed model response.
 * Missing keys become empty strings; extra keys are dropped.
 */
export function toExtractedFields(candidate: unknown): ExtractedFields {
  const filled = normalize(EXTRACTED_FIELD_DEFAULTS, candidate)
  return {
    chief_complaint: toFieldText(filled.chief_complaint),
    history: toFieldText(filled.history),
    examination: toFieldText(filled.examination),
    diagnosis: toFieldText(filled.diagnosis),
    plan: toFieldText(filled.plan),
    additional_observations: toFieldText(filled.additional_observations),
  }
}

export function serializeNote(note: ClinicalNote): string {
  return JSON.stringify(
    {
      chief_complaint: note.chief_complaint || "",
      history: note.history || "",
      examination: note.examination || "",
      diagnosis: note.diagnosis || "",
      plan: note.plan || "",
      additional_observations: note.additional_observations || "",
    },
    null,
    2,
  )
}

export function formatNoteText(note: ClinicalNote): string {
  return `Chief Complaint:
${note.chief_complaint || ""}

History:
${note.history || ""}

Examination:
${note.examination || ""}

Diagnosis:
${note.diagnosis || ""}

Plan:
${note.plan || ""}

Additional Observations:
${note.additional_observations || ""}`
}
