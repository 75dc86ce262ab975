export type {
  CompletionClient,
  CompletionProvider,
  CompletionRequest,
  CompletionResponseFormat,
  JsonObjectSchema,
} from "./completion"
export { createAnthropicCompletionClient, DEFAULT_ANTHROPIC_MODEL } from "./anthropic-client"
export type { AnthropicCompletionOptions } from "./anthropic-client"
export { createCompletionClient, resolveCompletionProvider } from "./provider-resolver"
export type { ResolvedCompletionProvider } from "./provider-resolver"

// Export prompts for versioned prompt management
export * as prompts from "./prompts"
