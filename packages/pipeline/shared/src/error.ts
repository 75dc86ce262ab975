export const PIPELINE_ERROR_CODES = [
  "configuration_error",
  "validation_error",
  "extraction_error",
  "invalid_shape",
  "api_error",
  "network_error",
  "timeout_error",
  "transcription_error",
] as const

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number]

function isPipelineErrorCode(code: string): code is PipelineErrorCode {
  return PIPELINE_ERROR_CODES.some((known) => known === code)
}

/**
 * Serializable error shape shared by every stage. `code` stays a plain string
 * here since payloads may come from another process.
 */
export interface PipelineError {
  code: string
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

export class PipelineStageError extends Error implements PipelineError {
  readonly code: PipelineErrorCode
  readonly recoverable: boolean
  readonly details?: Record<string, unknown>

  constructor(code: PipelineErrorCode, message: string, recoverable: boolean, details?: Record<string, unknown>) {
    super(message)
    this.name = "PipelineStageError"
    this.code = code
    this.recoverable = recoverable
    this.details = details
  }

  toJSON(): PipelineError {
    return createPipelineError(this.code, this.message, this.recoverable, this.details)
  }
}

export function createPipelineError(
  code: string,
  message: string,
  recoverable: boolean,
  details?: Record<string, unknown>,
): PipelineError {
  return { code, message, recoverable, details }
}

export function isPipelineError(error: unknown): error is PipelineError {
  if (!error || typeof error !== "object") return false
  return (
    "code" in error &&
    typeof error.code === "string" &&
    "message" in error &&
    typeof error.message === "string" &&
    "recoverable" in error &&
    typeof error.recoverable === "boolean"
  )
}

/**
 * True when `error` carries the given code, whether it is a thrown
 * PipelineStageError or a plain serialized PipelineError.
 */
export function hasPipelineErrorCode(error: unknown, code: PipelineErrorCode): boolean {
  return isPipelineError(error) && error.code === code
}

interface PipelineErrorFallback {
  code: PipelineErrorCode
  message: string
  recoverable: boolean
  details?: Record<string, unknown>
}

/**
 * Reduces anything thrown to a plain PipelineError. Known errors keep their
 * code; anything else takes the fallback code with its own message if it has one.
 */
export function toPipelineError(error: unknown, fallback: PipelineErrorFallback): PipelineError {
  if (isPipelineError(error)) {
    return createPipelineError(error.code, error.message, error.recoverable, error.details)
  }

  let message = fallback.message
  if (error instanceof Error && error.message) message = error.message
  else if (typeof error === "string" && error) message = error

  return createPipelineError(fallback.code, message, fallback.recoverable, fallback.details)
}

export function toPipelineStageError(error: unknown, fallback: PipelineErrorFallback): PipelineStageError {
  if (error instanceof PipelineStageError) {
    return error
  }
  const normalized = toPipelineError(error, fallback)
  const code = isPipelineErrorCode(normalized.code) ? normalized.code : fallback.code
  return new PipelineStageError(code, normalized.message, normalized.recoverable, normalized.details)
}
