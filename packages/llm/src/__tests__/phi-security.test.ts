import assert from "node:assert/strict"
import test from "node:test"
import { prompts } from "../index.js"

/**
 * PHI (Protected Health Information) Security Tests
 *
 * HIPAA Minimum Necessary: prompts sent to external completion providers carry
 * only the dictation, the consultation history and the formatted records.
 */

const promptSet = prompts.clinicalHistory.currentVersion

test("history synthesis prompt contains only the history and the records", () => {
  const consultationHistory = "Chest pain on exertion for two weeks."
  const recordsText = "Diagnosis: Stable angina"

  const userPrompt = promptSet.getHistorySynthesisUserPrompt({ consultationHistory, recordsText })

  assert.equal(
    userPrompt,
    "CURRENT CONSULTATION HISTORY:\nChest pain on exertion for two weeks.\n\n" +
      "PATIENT MEDICAL RECORDS:\nDiagnosis: Stable angina\n\n" +
      "Create a structured, scannable history summary.",
  )
})

test("system prompts do not carry identifiers or parameter names", () => {
  const systemPrompts = [
    promptSet.getExtractionSystemPrompt(),
    promptSet.getHistorySynthesisSystemPrompt(),
    promptSet.getNoteStructurerSystemPrompt("{}"),
  ]

  for (const systemPrompt of systemPrompts) {
    assert.ok(systemPrompt.length > 0)
    for (const keyword of ["patient_id", "John Doe", "Jane Smith"]) {
      assert.ok(!systemPrompt.includes(keyword), `System prompt must NOT contain "${keyword}"`)
    }
  }
})

test("extraction prompt names exactly the six fields of the schema", () => {
  const system = promptSet.getExtractionSystemPrompt()

  assert.deepEqual([...promptSet.EXTRACTED_FIELDS_SCHEMA.required], [...promptSet.EXTRACTED_FIELD_NAMES])
  for (const field of promptSet.EXTRACTED_FIELD_NAMES) {
    assert.ok(system.includes(`- ${field}:`), `extraction prompt should describe ${field}`)
    assert.equal(promptSet.EXTRACTED_FIELDS_SCHEMA.properties[field].type, "string")
  }
})

test("prompt versions are exported with metadata", () => {
  assert.equal(prompts.clinicalHistory.currentVersion, prompts.clinicalHistory.v1)
  assert.equal(promptSet.PROMPT_METADATA.version, promptSet.PROMPT_VERSION)
})
