import { z } from "zod"
import type { CompletionClient, CompletionRequest } from "@llm/completion"
import { PipelineStageError } from "@pipeline-errors"
import { assertSecureEndpoint, fetchWithTimeout, normalizeBaseUrl } from "@pipeline-endpoints"

export interface GroqRequest extends CompletionRequest {
  model?: string
  baseUrl?: string
  apiKey?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1"
export const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile"
const DEFAULT_TIMEOUT_MS = 60_000
const DEFAULT_MAX_TOKENS = 1024

const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
        text: z.string().nullish(),
      }),
    )
    .optional(),
})

async function readChatCompletion(response: Response): Promise<z.infer<typeof chatCompletionResponseSchema>> {
  if (!response.ok) {
    const errorText = await response.text().catch(() => "")
    throw new PipelineStageError(
      "api_error",
      `Groq request failed (${response.status}): ${errorText || response.statusText}`,
      response.status === 429 || response.status >= 500,
      { status: response.status, provider: "groq" },
    )
  }

  const parsed = chatCompletionResponseSchema.safeParse(await response.json())
  if (!parsed.success) {
    throw new PipelineStageError("api_error", "Unexpected response shape from Groq", true, { provider: "groq" })
  }
  return parsed.data
}

function assertNonEmpty(value: string | undefined, label: string): asserts value is string {
  if (!value || value.trim().length === 0) {
    throw new PipelineStageError("validation_error", `${label} is required`, false)
  }
}

/**
 * One OpenAI-compatible chat completion against Groq. The response body is
 * reduced to the first choice's text; anything else is an `api_error`.
 */
export async function runGroqRequest(request: GroqRequest): Promise<string> {
  const {
    system,
    prompt,
    responseFormat = "text",
    temperature = 0.2,
    maxTokens = DEFAULT_MAX_TOKENS,
    model = DEFAULT_GROQ_MODEL,
    baseUrl = DEFAULT_GROQ_BASE_URL,
    apiKey,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchFn = fetch,
  } = request

  assertNonEmpty(system, "system")
  assertNonEmpty(prompt, "prompt")
  if (!apiKey) {
    throw new PipelineStageError("configuration_error", "GROQ_API_KEY not found in environment variables", false)
  }
  assertSecureEndpoint(baseUrl, "Groq API")

  const url = `${normalizeBaseUrl(baseUrl)}/chat/completions`
  const completion = await fetchWithTimeout(
    fetchFn,
    url,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: prompt },
        ],
        temperature,
        max_tokens: maxTokens,
        ...(responseFormat === "json_object" ? { response_format: { type: "json_object" } } : {}),
        stream: false,
      }),
    },
    { timeoutMs, serviceName: "Groq API", provider: "groq" },
    readChatCompletion,
  )

  const choice = completion.choices?.[0]
  const content = choice?.message?.content ?? choice?.text
  if (!content) {
    throw new PipelineStageError("api_error", "No content returned from Groq response", true, { provider: "groq" })
  }

  return content
}

export interface GroqCompletionOptions {
  apiKey?: string
  model?: string
  baseUrl?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export function createGroqCompletionClient(options: GroqCompletionOptions = {}): CompletionClient {
  const { apiKey, model = DEFAULT_GROQ_MODEL, baseUrl = DEFAULT_GROQ_BASE_URL, timeoutMs, fetchFn } = options

  if (!apiKey) {
    throw new PipelineStageError("configuration_error", "GROQ_API_KEY not found in environment variables", false)
  }
  assertSecureEndpoint(baseUrl, "Groq API")

  return {
    provider: "groq",
    model,
    complete: (request) => runGroqRequest({ ...request, model, baseUrl, apiKey, timeoutMs, fetchFn }),
  }
}
