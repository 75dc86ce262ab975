export { ALLOWED_AUDIO_EXTENSIONS, MAX_AUDIO_FILE_BYTES, getAudioExtension, validateAudioFile } from "./core/audio-file"
export type { AudioExtension, AudioFileInfo } from "./core/audio-file"
export { extractTranscriptText } from "./core/transcript-response"
export type { TranscriptionOptions } from "./core/types"

// Transcription providers
export { transcribeAudioBuffer as transcribeWithElevenLabs } from "./providers/elevenlabs-transcriber"
export { transcribeAudioBuffer as transcribeWithWhisper } from "./providers/whisper-transcriber"
export { resolveTranscriptionProvider, transcribeWithResolvedProvider } from "./providers/provider-resolver"
export type { ResolvedTranscriptionProvider, TranscriptionProvider } from "./providers/provider-resolver"
