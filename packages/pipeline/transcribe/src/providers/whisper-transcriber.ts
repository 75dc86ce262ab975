import { PipelineStageError, toPipelineStageError } from "../../../shared/src/error"
import { assertSecureEndpoint, fetchWithTimeout } from "../../../shared/src/endpoint"
import { validateAudioFile } from "../core/audio-file"
import { extractTranscriptText } from "../core/transcript-response"
import { DEFAULT_TRANSCRIPTION_TIMEOUT_MS, type TranscriptionOptions } from "../core/types"

export const DEFAULT_WHISPER_URL = "https://api.openai.com/v1/audio/transcriptions"
export const DEFAULT_WHISPER_MODEL = "whisper-1"

async function readTranscript(response: Response): Promise<string> {
  if (!response.ok) {
    const errorText = await response.text().catch(() => "")
    throw new PipelineStageError("api_error", `Transcription failed: ${response.status} ${errorText}`, true, {
      status: response.status,
      provider: "whisper_openai",
    })
  }

  try {
    return extractTranscriptText(await response.json(), "whisper_openai")
  } catch (error) {
    throw toPipelineStageError(error, {
      code: "transcription_error",
      message: "Whisper returned an unreadable transcription",
      recoverable: true,
      details: { provider: "whisper_openai" },
    })
  }
}

export async function transcribeAudioBuffer(
  buffer: Buffer,
  filename: string,
  options: TranscriptionOptions = {},
): Promise<string> {
  const {
    apiKey = process.env.OPENAI_API_KEY,
    model = process.env.WHISPER_OPENAI_MODEL || DEFAULT_WHISPER_MODEL,
    url = process.env.WHISPER_OPENAI_URL || DEFAULT_WHISPER_URL,
    timeoutMs = DEFAULT_TRANSCRIPTION_TIMEOUT_MS,
    fetchFn = fetch,
  } = options

  // Validate HTTPS before sending any PHI
  assertSecureEndpoint(url, "Whisper API")

  if (!apiKey) {
    throw new PipelineStageError(
      "configuration_error",
      "Missing OPENAI_API_KEY. Please configure your API key in the environment.",
      false,
    )
  }
  const { contentType } = validateAudioFile(filename, buffer.byteLength)

  const formData = new FormData()
  formData.append("file", new Blob([new Uint8Array(buffer)], { type: contentType }), filename)
  formData.append("model", model)

  return fetchWithTimeout(
    fetchFn,
    url,
    {
      method: "POST",
      headers: { Authorization: `Bearer ${apiKey}` },
      body: formData,
    },
    { timeoutMs, serviceName: "Whisper API", provider: "whisper_openai" },
    readTranscript,
  )
}
