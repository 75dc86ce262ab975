import assert from "node:assert/strict"
import test from "node:test"
import Anthropic from "@anthropic-ai/sdk"
import {
  createAnthropicCompletionClient,
  readMessageContent,
  toAnthropicStageError,
} from "../anthropic-client.js"
import { PipelineStageError } from "@pipeline-errors"

test("a missing API key is a configuration error", () => {
  assert.throws(
    () => createAnthropicCompletionClient({}),
    (error: unknown) => error instanceof PipelineStageError && error.code === "configuration_error",
  )
})

test("the client reports its provider and model", () => {
  const client = createAnthropicCompletionClient({ apiKey: "test-key", model: "claude-test" })

  assert.equal(client.provider, "anthropic")
  assert.equal(client.model, "claude-test")
})

test("structured responses unwrap the tool input to JSON text", () => {
  const content = [
    { type: "text", text: "Here are the fields." },
    { type: "tool_use", id: "toolu_1", name: "ClinicalFields", input: { diagnosis: "Migraine" } },
  ]

  assert.equal(readMessageContent(content, true), '{\n  "diagnosis": "Migraine"\n}')
})

test("plain responses read the text block", () => {
  const content = [{ type: "text", text: "CHRONIC CONDITIONS:\n• Asthma" }]

  assert.equal(readMessageContent(content, false), "CHRONIC CONDITIONS:\n• Asthma")
})

test("structured responses without a tool block fall back to the text block", () => {
  assert.equal(readMessageContent([{ type: "text", text: '{"plan":"Rest"}' }], true), '{"plan":"Rest"}')
})

test("responses without text are api errors", () => {
  assert.throws(
    () => readMessageContent([{ type: "tool_use", input: { plan: "Rest" } }], false),
    (error: unknown) =>
      error instanceof PipelineStageError &&
      error.code === "api_error" &&
      error.message === "No text content in Anthropic response",
  )
})

test("SDK connection timeouts become timeout_error", () => {
  const error = toAnthropicStageError(new Anthropic.APIConnectionTimeoutError(), 5000)

  assert.equal(error.code, "timeout_error")
  assert.equal(error.message, "Anthropic request timed out after 5000ms")
  assert.equal(error.recoverable, true)
})

test("other SDK failures become api_error with their message", () => {
  const error = toAnthropicStageError(new Error("overloaded"), 5000)

  assert.equal(error.code, "api_error")
  assert.equal(error.message, "overloaded")
  assert.deepEqual(error.details, { provider: "anthropic" })
})
