import Anthropic from "@anthropic-ai/sdk"
import { PipelineStageError, toPipelineStageError } from "@pipeline-errors"
import type { CompletionClient, CompletionRequest } from "./completion"

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929"
const DEFAULT_MAX_TOKENS = 4096
const DEFAULT_TIMEOUT_MS = 60_000

interface MessageBlock {
  type: string
  text?: unknown
  input?: unknown
}

/**
 * Structured requests answer with a tool_use block whose input is the JSON
 * object; everything else reads the first text block.
 */
export function readMessageContent(content: readonly MessageBlock[], structured: boolean): string {
  if (structured) {
    const toolUseBlock = content.find((block) => block.type === "tool_use")
    if (toolUseBlock && toolUseBlock.input !== undefined) {
      return JSON.stringify(toolUseBlock.input, null, 2)
    }
  }

  const textBlock = content.find((block) => block.type === "text")
  if (typeof textBlock?.text !== "string") {
    throw new PipelineStageError("api_error", "No text content in Anthropic response", true, {
      provider: "anthropic",
    })
  }

  return textBlock.text
}

export function toAnthropicStageError(error: unknown, timeoutMs: number): PipelineStageError {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new PipelineStageError("timeout_error", `Anthropic request timed out after ${timeoutMs}ms`, true, {
      provider: "anthropic",
    })
  }
  return toPipelineStageError(error, {
    code: "api_error",
    message: "Anthropic request failed",
    recoverable: true,
    details: { provider: "anthropic" },
  })
}

export interface AnthropicCompletionOptions {
  apiKey?: string
  model?: string
  timeoutMs?: number
}

export function createAnthropicCompletionClient(options: AnthropicCompletionOptions = {}): CompletionClient {
  const { apiKey, model = DEFAULT_ANTHROPIC_MODEL, timeoutMs = DEFAULT_TIMEOUT_MS } = options

  if (!apiKey) {
    throw new PipelineStageError(
      "configuration_error",
      "ANTHROPIC_API_KEY environment variable is required. " +
        "Please set it in your environment before generating clinical notes.",
      false,
    )
  }

  // No SDK retries: a failed completion is surfaced or degraded by the caller.
  const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 })

  async function complete({
    system,
    prompt,
    jsonSchema,
    temperature,
    maxTokens = DEFAULT_MAX_TOKENS,
  }: CompletionRequest): Promise<string> {
    const requestParams: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      max_tokens: maxTokens,
      messages: [
        {
          role: "user",
          content: prompt,
        },
      ],
    }

    if (temperature !== undefined) {
      requestParams.temperature = temperature
    }

    if (jsonSchema) {
      // Tool use enforces the schema for structured output
      requestParams.system = [
        {
          type: "text",
          text: system,
        },
      ]
      requestParams.tools = [
        {
          name: jsonSchema.name,
          description: "Return the extracted clinical fields following this exact structure",
          input_schema: jsonSchema.schema,
        },
      ]
      requestParams.tool_choice = {
        type: "tool",
        name: jsonSchema.name,
      }
    } else {
      requestParams.system = system
    }

    let message: Anthropic.Message
    try {
      message = await client.messages.create(requestParams)
    } catch (error) {
      throw toAnthropicStageError(error, timeoutMs)
    }

    return readMessageContent(message.content, jsonSchema !== undefined)
  }

  return { provider: "anthropic", model, complete }
}
