export interface TranscriptionOptions {
  apiKey?: string
  model?: string
  url?: string
  timeoutMs?: number
  fetchFn?: typeof fetch
}

export const DEFAULT_TRANSCRIPTION_TIMEOUT_MS = 120_000
