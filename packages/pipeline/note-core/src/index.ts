export { buildClinicalNote, validateClinicalNoteRequest, clinicalNoteRequestSchema } from "./note-generator"
export type { ClinicalNoteRequest, ClinicalNoteResult, ClinicalNotePipelineDeps } from "./note-generator"
export { extractClinicalFields } from "./extraction"
export type { ExtractionDeps } from "./extraction"
export { synthesizeHistory } from "./history-synthesis"
export type { HistorySynthesisDeps, HistorySynthesisResult } from "./history-synthesis"
export { structureClinicalNote } from "./note-structurer"
export { parseJsonResponse, stripMarkdownFences } from "./json-response"
export {
  EMPTY_NOTE,
  EXTRACTED_FIELD_KEYS,
  formatNoteText,
  serializeNote,
  toExtractedFields,
} from "./clinical-models/clinical-note"
export type { ClinicalNote, ExtractedFields } from "./clinical-models/clinical-note"
export { CLINICAL_NOTE_SCHEMA, isPlainObject, normalize } from "./clinical-models/schema-defaults"
export type { JsonObject, JsonValue } from "./clinical-models/schema-defaults"
export {
  formatForPrompt,
  hasRecordData,
  parseMedicalRecord,
  storedMedicalRecordSchema,
  NO_DETAILED_RECORDS_TEXT,
  NO_RECORDS_TEXT,
} from "./clinical-models/medical-record"
export type {
  MedicalHistoryLoader,
  Medication,
  PatientId,
  StoredMedicalRecord,
  TreatmentPlan,
} from "./clinical-models/medical-record"
