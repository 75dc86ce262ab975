import { z } from "zod"

export type PatientId = string | number

export const medicationSchema = z
  .object({
    name: z.string().nullish(),
    dosage: z.string().nullish(),
    frequency: z.string().nullish(),
    duration_days: z.union([z.number(), z.string()]).nullish(),
    warning: z.string().nullish(),
  })
  .passthrough()

export const treatmentPlanSchema = z
  .object({
    medications: z.array(medicationSchema).optional(),
    risk_flags: z.array(z.string()).optional(),
    instructions: z.string().nullish(),
  })
  .passthrough()

export const storedMedicalRecordSchema = z
  .object({
    chief_complaint: z.string().nullish(),
    diagnosis: z.string().nullish(),
    notes: z.string().nullish(),
    treatment_plan: treatmentPlanSchema.nullish(),
  })
  .passthrough()

export type Medication = z.infer<typeof medicationSchema>
export type TreatmentPlan = z.infer<typeof treatmentPlanSchema>
export type StoredMedicalRecord = z.infer<typeof storedMedicalRecordSchema>

/**
 * Read-only source of a patient's prior history. "Not found" is an empty
 * record, never an error.
 */
export interface MedicalHistoryLoader {
  load(patientId?: PatientId | null): Promise<StoredMedicalRecord>
}

export const NO_RECORDS_TEXT = "No previous medical records available."
export const NO_DETAILED_RECORDS_TEXT = "No detailed medical records available."

/**
 * Validates an untrusted record. Anything that does not fit the record shape
 * is treated as "no record".
 */
export function parseMedicalRecord(raw: unknown): StoredMedicalRecord {
  const result = storedMedicalRecordSchema.safeParse(raw)
  return result.success ? result.data : {}
}

export function hasRecordData(record: StoredMedicalRecord | null | undefined): record is StoredMedicalRecord {
  if (!record) return false
  return Object.values(record).some((value) => value !== null && value !== undefined)
}

function formatMedication(medication: Medication): string {
  const line =
    `- ${medication.name ?? "Unknown"} ${medication.dosage ?? ""} ` +
    `${medication.frequency ?? ""} for ${medication.duration_days ?? "?"} days`
  return medication.warning ? `${line}\n  Warning: ${medication.warning}` : line
}

/**
 * Flattens a stored record into the text block fed to history synthesis.
 */
export function formatForPrompt(record: StoredMedicalRecord | null | undefined): string {
  if (!hasRecordData(record)) {
    return NO_RECORDS_TEXT
  }

  const parts: string[] = []

  if (record.chief_complaint) parts.push(`Previous Complaint: ${record.chief_complaint}`)
  if (record.diagnosis) parts.push(`Diagnosis: ${record.diagnosis}`)
  if (record.notes) parts.push(`Clinical Notes: ${record.notes}`)

  const plan = record.treatment_plan
  if (plan) {
    const medications = plan.medications ?? []
    if (medications.length > 0) {
      parts.push("\nCurrent Medications:")
      parts.push(...medications.map(formatMedication))
    }

    const riskFlags = plan.risk_flags ?? []
    if (riskFlags.length > 0) {
      parts.push("\nRisk Flags:")
      parts.push(...riskFlags.map((flag) => `- ${flag}`))
    }

    if (plan.instructions) {
      parts.push(`\nTreatment Instructions: ${plan.instructions}`)
    }
  }

  return parts.length > 0 ? parts.join("\n") : NO_DETAILED_RECORDS_TEXT
}
