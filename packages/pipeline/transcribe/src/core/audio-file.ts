import { PipelineStageError } from "../../../shared/src/error"

export const ALLOWED_AUDIO_EXTENSIONS = ["mp3", "wav", "webm", "m4a", "ogg", "flac"] as const
export type AudioExtension = (typeof ALLOWED_AUDIO_EXTENSIONS)[number]

// 25MB
export const MAX_AUDIO_FILE_BYTES = 25 * 1024 * 1024

const CONTENT_TYPES: Record<AudioExtension, string> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
  webm: "audio/webm",
  m4a: "audio/mp4",
  ogg: "audio/ogg",
  flac: "audio/flac",
}

function isAudioExtension(value: string): value is AudioExtension {
  return ALLOWED_AUDIO_EXTENSIONS.some((extension) => extension === value)
}

export function getAudioExtension(filename: string): AudioExtension | undefined {
  const dot = filename.lastIndexOf(".")
  if (dot === -1) return undefined
  const extension = filename.slice(dot + 1).toLowerCase()
  return isAudioExtension(extension) ? extension : undefined
}

export interface AudioFileInfo {
  extension: AudioExtension
  contentType: string
}

export function validateAudioFile(filename: string, sizeBytes: number): AudioFileInfo {
  const extension = getAudioExtension(filename)
  if (!extension) {
    throw new PipelineStageError(
      "validation_error",
      `Invalid file type. Allowed types: ${ALLOWED_AUDIO_EXTENSIONS.join(", ")}`,
      false,
      { filename },
    )
  }
  if (sizeBytes === 0) {
    throw new PipelineStageError("validation_error", "Audio file is empty", false, { filename })
  }
  if (sizeBytes > MAX_AUDIO_FILE_BYTES) {
    throw new PipelineStageError(
      "validation_error",
      `File too large. Maximum size: ${MAX_AUDIO_FILE_BYTES / (1024 * 1024)}MB`,
      false,
      { filename, sizeBytes },
    )
  }
  return { extension, contentType: CONTENT_TYPES[extension] }
}
