export type CompletionProvider = "groq" | "anthropic"

export type CompletionResponseFormat = "text" | "json_object"

export interface JsonObjectSchema {
  type: "object"
  properties: Record<string, unknown>
  required?: readonly string[]
  [key: string]: unknown
}

export interface CompletionRequest {
  system: string
  prompt: string
  responseFormat?: CompletionResponseFormat
  /**
   * Optional schema for providers that can enforce structure (Anthropic tool use).
   * Providers without schema support fall back to plain JSON-object mode.
   */
  jsonSchema?: {
    name: string
    schema: JsonObjectSchema
  }
  temperature?: number
  maxTokens?: number
}

/**
 * A structured-completion collaborator. Implementations unwrap whatever the
 * upstream returns into a single string before it reaches the pipeline.
 */
export interface CompletionClient {
  readonly provider: CompletionProvider
  readonly model: string
  complete(request: CompletionRequest): Promise<string>
}
