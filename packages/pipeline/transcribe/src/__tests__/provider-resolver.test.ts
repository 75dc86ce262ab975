import assert from "node:assert/strict"
import test from "node:test"
import { resolveTranscriptionProvider, transcribeWithResolvedProvider } from "../providers/provider-resolver.js"
import { PipelineStageError } from "../../../shared/src/error.js"

const audio = Buffer.from("fake-audio-bytes")

function isCode(code: string) {
  return (error: unknown) => error instanceof PipelineStageError && error.code === code
}

function capturingFetch(responseBody: unknown, status = 200) {
  const captured: { url?: string; init?: RequestInit; count: number } = { count: 0 }
  const fetchFn: typeof fetch = async (input, init) => {
    captured.count += 1
    captured.url = String(input)
    captured.init = init
    return new Response(typeof responseBody === "string" ? responseBody : JSON.stringify(responseBody), { status })
  }
  return { fetchFn, captured }
}

async function withoutEnv<T>(keys: string[], run: () => Promise<T>): Promise<T> {
  const saved = new Map(keys.map((key) => [key, process.env[key]]))
  for (const key of keys) delete process.env[key]
  try {
    return await run()
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  }
}

test("resolveTranscriptionProvider defaults to elevenlabs with scribe_v2", () => {
  assert.deepEqual(resolveTranscriptionProvider({ ELEVENLABS_API_KEY: "test-key" }), {
    provider: "elevenlabs",
    model: "scribe_v2",
    apiKey: "test-key",
  })
})

test("resolveTranscriptionProvider supports whisper aliases", () => {
  for (const alias of ["whisper_openai", "whisper-openai", "OpenAI", "whisper"]) {
    const resolved = resolveTranscriptionProvider({ TRANSCRIPTION_PROVIDER: alias, OPENAI_API_KEY: "test-key" })
    assert.equal(resolved.provider, "whisper_openai")
    assert.equal(resolved.model, "whisper-1")
    assert.equal(resolved.apiKey, "test-key")
  }
})

test("elevenlabs uploads the file with the model id and returns trimmed text", async () => {
  const { fetchFn, captured } = capturingFetch({ text: "  Patient reports a sore throat.  " })

  const transcript = await transcribeWithResolvedProvider(
    audio,
    "visit.webm",
    { provider: "elevenlabs", model: "scribe_v2", apiKey: "test-key" },
    { fetchFn },
  )

  assert.equal(transcript, "Patient reports a sore throat.")
  assert.equal(captured.url, "https://api.elevenlabs.io/v1/speech-to-text")
  assert.equal(new Headers(captured.init?.headers).get("xi-api-key"), "test-key")
  const body = captured.init?.body
  assert.ok(body instanceof FormData)
  assert.equal(body.get("model_id"), "scribe_v2")
  const file = body.get("file")
  assert.ok(file instanceof Blob)
  assert.equal(file.type, "audio/webm")
})

test("whisper sends a bearer token and the model field", async () => {
  const { fetchFn, captured } = capturingFetch({ text: "Follow-up in two weeks." })

  const transcript = await transcribeWithResolvedProvider(
    audio,
    "visit.mp3",
    { provider: "whisper_openai", model: "whisper-1", apiKey: "test-key" },
    { fetchFn, url: "https://api.openai.com/v1/audio/transcriptions" },
  )

  assert.equal(transcript, "Follow-up in two weeks.")
  assert.equal(new Headers(captured.init?.headers).get("Authorization"), "Bearer test-key")
  const body = captured.init?.body
  assert.ok(body instanceof FormData)
  assert.equal(body.get("model"), "whisper-1")
})

test("unsupported audio types are rejected before upload", async () => {
  const { fetchFn, captured } = capturingFetch({ text: "unused" })

  await assert.rejects(
    () =>
      transcribeWithResolvedProvider(
        audio,
        "visit.txt",
        { provider: "elevenlabs", model: "scribe_v2", apiKey: "test-key" },
        { fetchFn },
      ),
    /Invalid file type\. Allowed types: mp3, wav, webm, m4a, ogg, flac/,
  )
  assert.equal(captured.count, 0)
})

test("a missing elevenlabs key is a configuration error", async () => {
  const { fetchFn, captured } = capturingFetch({ text: "unused" })

  await withoutEnv(["ELEVENLABS_API_KEY"], () =>
    assert.rejects(
      () => transcribeWithResolvedProvider(audio, "visit.wav", resolveTranscriptionProvider({}), { fetchFn }),
      isCode("configuration_error"),
    ),
  )
  assert.equal(captured.count, 0)
})

test("insecure remote endpoints are refused", async () => {
  const { fetchFn } = capturingFetch({ text: "unused" })

  await assert.rejects(
    () =>
      transcribeWithResolvedProvider(
        audio,
        "visit.wav",
        { provider: "whisper_openai", model: "whisper-1", apiKey: "test-key" },
        { fetchFn, url: "http://transcribe.example.com/v1/audio/transcriptions" },
      ),
    isCode("configuration_error"),
  )
})

test("provider failures surface as api_error", async () => {
  const { fetchFn } = capturingFetch("upstream unavailable", 503)

  await assert.rejects(
    () =>
      transcribeWithResolvedProvider(
        audio,
        "visit.ogg",
        { provider: "elevenlabs", model: "scribe_v2", apiKey: "test-key" },
        { fetchFn },
      ),
    (error: unknown) => {
      assert.ok(error instanceof PipelineStageError)
      assert.equal(error.code, "api_error")
      assert.equal(error.message, "Transcription failed: 503 upstream unavailable")
      assert.equal(error.recoverable, true)
      return true
    },
  )
})

test("payloads without text surface as transcription_error", async () => {
  const { fetchFn } = capturingFetch({ words: [] })

  await assert.rejects(
    () =>
      transcribeWithResolvedProvider(
        audio,
        "visit.flac",
        { provider: "elevenlabs", model: "scribe_v2", apiKey: "test-key" },
        { fetchFn },
      ),
    isCode("transcription_error"),
  )
})
