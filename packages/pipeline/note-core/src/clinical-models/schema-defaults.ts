import { PipelineStageError } from "../../../shared/src/error"

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject

export interface JsonObject {
  [key: string]: JsonValue
}

/**
 * Full consultation form template. Every key here is guaranteed to exist
 * after `normalize`, even if the model omits it.
 */
export const CLINICAL_NOTE_SCHEMA: JsonObject = {
  patient_info: {
    full_name: "",
    age: null,
    gender: "",
    date_of_birth: "",
    phone_number: "",
    address: "",
  },
  consultation: {
    date: "",
    chief_complaint: "",
    history_of_present_illness: "",
    past_medical_history: [],
    family_history: "",
    allergies: [],
    current_medications: [],
  },
  vitals: {
    blood_pressure: "",
    heart_rate: "",
    temperature: "",
    respiratory_rate: "",
    oxygen_saturation: "",
    weight: "",
    height: "",
  },
  physical_examination: "",
  diagnosis: [],
  observation: "",
  medical_plan: "",
  prescriptions: [],
  follow_up: "",
  additional_notes: "",
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// Plain assignment would run the `__proto__` setter instead of storing the key.
function setOwn(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * Merges an untrusted candidate over the schema defaults.
 *
 * - schema keys missing from the candidate take a copy of their default
 * - keys where both sides are objects merge recursively
 * - otherwise the candidate value wins as-is (no type coercion)
 * - candidate keys unknown to the schema are kept
 *
 * Throws `invalid_shape` when the candidate itself is not an object.
 */
export function normalize(schemaDefaults: JsonObject, candidate: unknown): Record<string, unknown> {
  if (!isPlainObject(candidate)) {
    throw new PipelineStageError(
      "invalid_shape",
      `Expected a JSON object but received ${Array.isArray(candidate) ? "an array" : typeof candidate}`,
      false,
    )
  }

  const merged: Record<string, unknown> = {}

  for (const [key, defaultValue] of Object.entries(schemaDefaults)) {
    if (!Object.hasOwn(candidate, key)) {
      setOwn(merged, key, structuredClone(defaultValue))
      continue
    }

    const override = candidate[key]
    setOwn(merged, key, isPlainObject(defaultValue) && isPlainObject(override) ? normalize(defaultValue, override) : override)
  }

  for (const [key, value] of Object.entries(candidate)) {
    if (!Object.hasOwn(schemaDefaults, key)) {
      setOwn(merged, key, value)
    }
  }

  return merged
}
