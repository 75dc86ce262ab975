/**
 * Clinical History Prompts - Version 1
 * Two-step pipeline: field extraction from a dictation, then history synthesis
 * against the patient's stored records. Also holds the full-form structurer prompt.
 */

export const PROMPT_VERSION = "v1"
export const MODEL_OPTIMIZED_FOR = "llama-3.3-70b-versatile"

export const EXTRACTED_FIELD_NAMES = [
  "chief_complaint",
  "history",
  "examination",
  "diagnosis",
  "plan",
  "additional_observations",
] as const

/**
 * JSON Schema for the extraction step
 * All fields are required strings; providers with tool use enforce it
 */
export const EXTRACTED_FIELDS_SCHEMA = {
  type: "object",
  properties: {
    chief_complaint: {
      type: "string",
      description: "Main reason for the visit",
    },
    history: {
      type: "string",
      description: "Patient's history and present illness details from this consultation",
    },
    examination: {
      type: "string",
      description: "Physical examination findings",
    },
    diagnosis: {
      type: "string",
      description: "Doctor's diagnosis or assessment",
    },
    plan: {
      type: "string",
      description: "Treatment plan and recommendations",
    },
    additional_observations: {
      type: "string",
      description: "Any other relevant notes or observations",
    },
  },
  required: EXTRACTED_FIELD_NAMES,
  additionalProperties: false,
} as const

export const HISTORY_SECTIONS = [
  "CHRONIC CONDITIONS",
  "CURRENT MEDICATIONS",
  "ALLERGIES & WARNINGS",
  "RECENT MEDICAL HISTORY",
  "RISK FLAGS",
] as const

export const EMPTY_SECTION_TEXT = "None documented"

export function getExtractionSystemPrompt(): string {
  return `You are a medical transcription assistant. Extract clinical information from the transcribed text and return it as structured JSON.

Extract these 6 fields:
- chief_complaint: Main reason for visit
- history: Patient's history and present illness details from this consultation
- examination: Physical examination findings
- diagnosis: Doctor's diagnosis or assessment
- plan: Treatment plan and recommendations
- additional_observations: Any other relevant notes or observations

Return ONLY valid JSON with these exact field names. If a field is not mentioned in the text, use an empty string.
Do not include markdown formatting or explanations.`
}

export function getHistorySynthesisSystemPrompt(): string {
  return `You are a clinical documentation specialist. Create a STRUCTURED, SCANNABLE patient history summary that a doctor can review in seconds.

Format the output with clear sections and bullet points:

${HISTORY_SECTIONS[0]}:
• List any chronic diseases or ongoing conditions
• Include relevant past diagnoses

${HISTORY_SECTIONS[1]}:
• List long-term medications with dosage
• Highlight any warnings or interactions

${HISTORY_SECTIONS[2]}:
• List known allergies
• Note any medication warnings or contraindications

${HISTORY_SECTIONS[3]}:
• Brief summary of current complaint history
• Relevant recent treatments or issues

${HISTORY_SECTIONS[4]}:
• Any anomalies that could interfere with treatment
• Drug interactions or complications to watch for

Rules:
- Keep each bullet point to ONE line maximum
- Only include clinically relevant information
- Use medical terminology but keep it clear
- If a section has no information, write "${EMPTY_SECTION_TEXT}"
- Be extremely concise - doctors need to scan this quickly`
}

export interface HistorySynthesisPromptParams {
  consultationHistory: string
  recordsText: string
}

/**
 * Only the consultation history and the formatted records are sent.
 * Patient identifiers never reach the prompt.
 */
export function getHistorySynthesisUserPrompt(params: HistorySynthesisPromptParams): string {
  const { consultationHistory, recordsText } = params

  return `CURRENT CONSULTATION HISTORY:
${consultationHistory}

PATIENT MEDICAL RECORDS:
${recordsText}

Create a structured, scannable history summary.`
}

export function getNoteStructurerSystemPrompt(templateJson: string): string {
  return `You are a medical transcription assistant.
You will receive raw text that was produced by a speech-to-text system during
a doctor's consultation. The text may contain:
  • speech recognition errors (homophones, missing words, wrong punctuation)
  • medical jargon spoken quickly or abbreviated
  • mixed languages or informal phrasing

Your tasks, in order, are:
1. Correct the transcription: fix spelling, grammar, and medical
   terminology while preserving the original meaning.
2. Extract every piece of clinical information and map it into the
   JSON structure below. If a field is not mentioned, leave it as its
   default (empty string, empty list, or null).
3. Return ONLY valid JSON, no markdown fences, no commentary.

JSON template:
${templateJson}

Rules:
- past_medical_history, allergies, current_medications, diagnosis,
  and prescriptions must be arrays of strings.
- age must be an integer or null.
- Dates should be in YYYY-MM-DD format when possible.
- Vital-sign values should include units (e.g. "120/80 mmHg").
- If the doctor mentions observation notes or a medical/treatment plan,
  populate observation and medical_plan accordingly.
- Always return the full JSON object, even if most fields are empty.`
}

export const PROMPT_METADATA = {
  version: PROMPT_VERSION,
  created_at: "2026-02-11",
  optimized_for: MODEL_OPTIMIZED_FOR,
  description: "Two-step extraction and history synthesis with JSON-object mode",
  changelog: ["Initial release: six-field extraction, five-section history synthesis, full-form structurer"],
} as const
