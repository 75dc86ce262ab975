import { createGroqCompletionClient, DEFAULT_GROQ_BASE_URL, DEFAULT_GROQ_MODEL } from "@llm-groq"
import { createAnthropicCompletionClient, DEFAULT_ANTHROPIC_MODEL } from "./anthropic-client"
import type { CompletionClient, CompletionProvider } from "./completion"

export interface ResolvedCompletionProvider {
  provider: CompletionProvider
  model: string
  timeoutMs: number
}

const DEFAULT_TIMEOUT_MS = 60_000

function normalizeProvider(rawProvider: string | undefined): string {
  return rawProvider?.trim().toLowerCase() || ""
}

function parseTimeout(raw: string | undefined): number {
  const value = Number(raw)
  return Number.isFinite(value) && value > 0 ? value : DEFAULT_TIMEOUT_MS
}

export function resolveCompletionProvider(env: NodeJS.ProcessEnv = process.env): ResolvedCompletionProvider {
  const provider = normalizeProvider(env.COMPLETION_PROVIDER)
  const timeoutMs = parseTimeout(env.COMPLETION_TIMEOUT_MS)

  if (provider === "anthropic" || provider === "claude") {
    return {
      provider: "anthropic",
      model: env.ANTHROPIC_MODEL?.trim() || DEFAULT_ANTHROPIC_MODEL,
      timeoutMs,
    }
  }

  return {
    provider: "groq",
    model: env.GROQ_MODEL?.trim() || DEFAULT_GROQ_MODEL,
    timeoutMs,
  }
}

/**
 * Builds the completion client for the configured provider. A missing
 * credential raises `configuration_error` here, before any request is made.
 */
export function createCompletionClient(
  env: NodeJS.ProcessEnv = process.env,
  resolved: ResolvedCompletionProvider = resolveCompletionProvider(env),
): CompletionClient {
  switch (resolved.provider) {
    case "anthropic":
      return createAnthropicCompletionClient({
        apiKey: env.ANTHROPIC_API_KEY,
        model: resolved.model,
        timeoutMs: resolved.timeoutMs,
      })
    case "groq":
    default:
      return createGroqCompletionClient({
        apiKey: env.GROQ_API_KEY,
        model: resolved.model,
        baseUrl: env.GROQ_BASE_URL?.trim() || DEFAULT_GROQ_BASE_URL,
        timeoutMs: resolved.timeoutMs,
      })
  }
}
