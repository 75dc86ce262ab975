/**
 * Stored medical history loaders. Read-only: the persistence layer owns
 * these records, the pipeline only reads them.
 */

import { readFile } from "node:fs/promises"
import { z } from "zod"
import {
  parseMedicalRecord,
  type MedicalHistoryLoader,
  type PatientId,
  type StoredMedicalRecord,
} from "@note-core"
import { debugLog } from "./debug-logger"

const medicalHistoryFileSchema = z.object({
  patients: z.record(z.unknown()),
})

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export function resolveMedicalHistoryPath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.MEDICAL_HISTORY_PATH?.trim() || undefined
}

/**
 * Loads records from a JSON file shaped `{ "patients": { "<id>": record } }`.
 * A missing file or patient yields an empty record; an unreadable or
 * malformed file rejects.
 */
export function createJsonMedicalHistoryLoader(filePath: string): MedicalHistoryLoader {
  return {
    async load(patientId?: PatientId | null): Promise<StoredMedicalRecord> {
      if (patientId === undefined || patientId === null) {
        return {}
      }

      let fileContent: string
      try {
        fileContent = await readFile(filePath, "utf-8")
      } catch (error) {
        if (isMissingFileError(error)) {
          debugLog(`Medical history file not found at ${filePath}`)
          return {}
        }
        throw error
      }

      const { patients } = medicalHistoryFileSchema.parse(JSON.parse(fileContent))
      return parseMedicalRecord(patients[String(patientId)])
    },
  }
}

export function createInMemoryMedicalHistoryLoader(
  records: Record<string, StoredMedicalRecord> | Map<string, StoredMedicalRecord>,
): MedicalHistoryLoader {
  const byPatient = records instanceof Map ? records : new Map(Object.entries(records))
  return {
    async load(patientId?: PatientId | null): Promise<StoredMedicalRecord> {
      if (patientId === undefined || patientId === null) {
        return {}
      }
      return byPatient.get(String(patientId)) ?? {}
    },
  }
}
