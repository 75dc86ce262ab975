import type { TranscriptionOptions } from "../core/types"
import { DEFAULT_ELEVENLABS_MODEL, transcribeAudioBuffer as transcribeWithElevenLabs } from "./elevenlabs-transcriber"
import { DEFAULT_WHISPER_MODEL, transcribeAudioBuffer as transcribeWithWhisperOpenAI } from "./whisper-transcriber"

export type TranscriptionProvider = "elevenlabs" | "whisper_openai"

export interface ResolvedTranscriptionProvider {
  provider: TranscriptionProvider
  model: string
  apiKey?: string
}

function normalizeProvider(rawProvider: string | undefined): string {
  return rawProvider?.trim().toLowerCase() || ""
}

export function resolveTranscriptionProvider(env: NodeJS.ProcessEnv = process.env): ResolvedTranscriptionProvider {
  const provider = normalizeProvider(env.TRANSCRIPTION_PROVIDER)

  if (provider === "whisper_openai" || provider === "whisper-openai" || provider === "openai" || provider === "whisper") {
    return {
      provider: "whisper_openai",
      model: env.WHISPER_OPENAI_MODEL?.trim() || DEFAULT_WHISPER_MODEL,
      apiKey: env.OPENAI_API_KEY,
    }
  }

  return {
    provider: "elevenlabs",
    model: env.ELEVENLABS_MODEL?.trim() || DEFAULT_ELEVENLABS_MODEL,
    apiKey: env.ELEVENLABS_API_KEY,
  }
}

export async function transcribeWithResolvedProvider(
  buffer: Buffer,
  filename: string,
  resolved: ResolvedTranscriptionProvider = resolveTranscriptionProvider(),
  options: Omit<TranscriptionOptions, "apiKey" | "model"> = {},
): Promise<string> {
  const providerOptions: TranscriptionOptions = { ...options, apiKey: resolved.apiKey, model: resolved.model }
  switch (resolved.provider) {
    case "whisper_openai":
      return transcribeWithWhisperOpenAI(buffer, filename, providerOptions)
    case "elevenlabs":
    default:
      return transcribeWithElevenLabs(buffer, filename, providerOptions)
  }
}
