import assert from "node:assert/strict"
import test from "node:test"
import { structureClinicalNote } from "../note-structurer.js"
import { CLINICAL_NOTE_SCHEMA } from "../clinical-models/schema-defaults.js"
import { PipelineStageError } from "../../../shared/src/error.js"
import { createFakeCompletion } from "./fake-completion.js"

const dictation = "jane roe forty two year old female migraine three days prescribe sumatriptan"

test("structureClinicalNote completes a partial fenced response to the full form", async () => {
  const completion = createFakeCompletion([
    '```json\n{"patient_info":{"full_name":"Jane Roe","age":42,"gender":"female"},' +
      '"diagnosis":["Migraine"],"prescriptions":["Sumatriptan 50mg"],"triage":"routine"}\n```',
  ])

  const note = await structureClinicalNote(dictation, { completion })

  assert.deepEqual(note.patient_info, {
    full_name: "Jane Roe",
    age: 42,
    gender: "female",
    date_of_birth: "",
    phone_number: "",
    address: "",
  })
  assert.deepEqual(note.diagnosis, ["Migraine"])
  assert.deepEqual(note.prescriptions, ["Sumatriptan 50mg"])
  assert.deepEqual(note.vitals, CLINICAL_NOTE_SCHEMA.vitals)
  assert.deepEqual(note.consultation, CLINICAL_NOTE_SCHEMA.consultation)
  assert.equal(note.medical_plan, "")
  assert.equal(note.triage, "routine")
})

test("structureClinicalNote embeds the form template and asks for JSON", async () => {
  const completion = createFakeCompletion(["{}"])

  await structureClinicalNote(dictation, { completion })

  const [request] = completion.calls
  assert.ok(request.system.includes('"blood_pressure": ""'))
  assert.ok(request.system.includes('"age": null'))
  assert.equal(request.prompt, dictation)
  assert.equal(request.responseFormat, "json_object")
  assert.equal(request.temperature, 0.2)
  assert.equal(request.maxTokens, 2048)
})

test("structureClinicalNote reports unparseable responses as extraction errors", async () => {
  const completion = createFakeCompletion(["Sorry, I cannot help with that."])

  await assert.rejects(
    () => structureClinicalNote(dictation, { completion }),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "extraction_error" &&
      error.message.startsWith("Failed to structure clinical note: "),
  )
})

test("structureClinicalNote rejects empty dictation without calling the model", async () => {
  const completion = createFakeCompletion([])

  await assert.rejects(
    () => structureClinicalNote("  ", { completion }),
    (error: unknown) => error instanceof PipelineStageError && error.code === "validation_error",
  )
  assert.equal(completion.calls.length, 0)
})
