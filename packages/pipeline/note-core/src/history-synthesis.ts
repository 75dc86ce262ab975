import { prompts, type CompletionClient } from "@llm"
import { debugLog, debugLogPHI, debugWarn } from "@storage/debug-logger"
import { toPipelineError, type PipelineError } from "../../shared/src/error"
import { formatForPrompt, hasRecordData, type StoredMedicalRecord } from "./clinical-models/medical-record"

export interface HistorySynthesisDeps {
  completion: CompletionClient
}

export const SYNTHESIS_TEMPERATURE = 0.2
export const SYNTHESIS_MAX_TOKENS = 512

// `degraded` keeps the unmerged extraction history.
export type HistorySynthesisResult =
  | { status: "skipped"; history: string }
  | { status: "synthesized"; history: string }
  | { status: "degraded"; history: string; error: PipelineError }

export async function synthesizeHistory(
  consultationHistory: string,
  record: StoredMedicalRecord | null | undefined,
  deps: HistorySynthesisDeps,
): Promise<HistorySynthesisResult> {
  if (!hasRecordData(record)) {
    return { status: "skipped", history: consultationHistory }
  }

  const promptSet = prompts.clinicalHistory.currentVersion
  const recordsText = formatForPrompt(record)

  debugLog(`Synthesizing history against stored records (${recordsText.length} chars)`)

  try {
    const summary = await deps.completion.complete({
      system: promptSet.getHistorySynthesisSystemPrompt(),
      prompt: promptSet.getHistorySynthesisUserPrompt({ consultationHistory, recordsText }),
      responseFormat: "text",
      temperature: SYNTHESIS_TEMPERATURE,
      maxTokens: SYNTHESIS_MAX_TOKENS,
    })

    debugLogPHI("Synthesized history:", summary)
    return { status: "synthesized", history: summary.trim() }
  } catch (error) {
    const pipelineError = toPipelineError(error, {
      code: "api_error",
      message: "History synthesis request failed",
      recoverable: true,
      details: { stage: "history_synthesis" },
    })
    debugWarn(`Could not summarize medical history, keeping consultation history: ${pipelineError.message}`)
    return { status: "degraded", history: consultationHistory, error: pipelineError }
  }
}
