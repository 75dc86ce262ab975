import { z } from "zod"
import { PipelineStageError } from "../../../shared/src/error"

const textPayloadSchema = z.object({ text: z.string() })

/**
 * The single boundary where a provider payload becomes transcript text.
 * Accepts a bare string or any object carrying a string `text`.
 */
export function extractTranscriptText(response: unknown, provider: string): string {
  if (typeof response === "string") {
    return response.trim()
  }

  const parsed = textPayloadSchema.safeParse(response)
  if (!parsed.success) {
    throw new PipelineStageError("transcription_error", `Transcription response from ${provider} has no text`, true, {
      provider,
    })
  }

  return parsed.data.text.trim()
}
