import { PipelineStageError, toPipelineStageError } from "../../../shared/src/error"
import { assertSecureEndpoint, fetchWithTimeout } from "../../../shared/src/endpoint"
import { validateAudioFile } from "../core/audio-file"
import { extractTranscriptText } from "../core/transcript-response"
import { DEFAULT_TRANSCRIPTION_TIMEOUT_MS, type TranscriptionOptions } from "../core/types"

export const DEFAULT_ELEVENLABS_URL = "https://api.elevenlabs.io/v1/speech-to-text"
export const DEFAULT_ELEVENLABS_MODEL = "scribe_v2"

async function readTranscript(response: Response): Promise<string> {
  if (!response.ok) {
    const errorText = await response.text().catch(() => "")
    throw new PipelineStageError(
      "api_error",
      `Transcription failed: ${response.status} ${errorText}`,
      response.status === 429 || response.status >= 500,
      { status: response.status, provider: "elevenlabs" },
    )
  }

  try {
    return extractTranscriptText(await response.json(), "elevenlabs")
  } catch (error) {
    throw toPipelineStageError(error, {
      code: "transcription_error",
      message: "ElevenLabs returned an unreadable transcription",
      recoverable: true,
      details: { provider: "elevenlabs" },
    })
  }
}

export async function transcribeAudioBuffer(
  buffer: Buffer,
  filename: string,
  options: TranscriptionOptions = {},
): Promise<string> {
  const {
    apiKey = process.env.ELEVENLABS_API_KEY,
    model = process.env.ELEVENLABS_MODEL || DEFAULT_ELEVENLABS_MODEL,
    url = process.env.ELEVENLABS_STT_URL || DEFAULT_ELEVENLABS_URL,
    timeoutMs = DEFAULT_TRANSCRIPTION_TIMEOUT_MS,
    fetchFn = fetch,
  } = options

  if (!apiKey) {
    throw new PipelineStageError("configuration_error", "ELEVENLABS_API_KEY not found in environment", false)
  }

  // Validate HTTPS before sending any PHI
  assertSecureEndpoint(url, "ElevenLabs API")
  const { contentType } = validateAudioFile(filename, buffer.byteLength)

  const formData = new FormData()
  formData.append("file", new Blob([new Uint8Array(buffer)], { type: contentType }), filename)
  formData.append("model_id", model)

  return fetchWithTimeout(
    fetchFn,
    url,
    {
      method: "POST",
      headers: { "xi-api-key": apiKey },
      body: formData,
    },
    { timeoutMs, serviceName: "ElevenLabs API", provider: "elevenlabs" },
    readTranscript,
  )
}
