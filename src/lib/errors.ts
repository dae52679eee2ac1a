// Error taxonomy shared by the engines and the HTTP layer.
// Codes are what clients see in `{ error: code }`.

export type ErrorCode =
  | "not_found"
  | "unsupported_format"
  | "extraction_failed"
  | "provider_error"
  | "validation_error"
  | "no_candidates"
  | "embedding_mismatch"
  | "unauthorized"
  | "forbidden"
  | "rate_limited"
  | "conflict"

export class AppError extends Error {
  readonly code: ErrorCode
  readonly status: number
  readonly details: Record<string, unknown> | undefined

  constructor(code: ErrorCode, status: number, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = "AppError"
    this.code = code
    this.status = status
    this.details = details
  }
}

export const notFound = (message: string, details?: Record<string, unknown>) =>
  new AppError("not_found", 404, message, details)

export const unsupportedFormat = (extension: string) =>
  new AppError("unsupported_format", 400, `Unsupported file type: ${extension || "(none)"}`, {
    allowed: [".txt", ".docx", ".pdf"],
  })

export const extractionFailed = (message: string) => new AppError("extraction_failed", 422, message)

export const validationError = (message: string, details?: Record<string, unknown>) =>
  new AppError("validation_error", 400, message, details)

export const noCandidates = () => new AppError("no_candidates", 400, "At least one candidate CV is required")

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new AppError("conflict", 409, message, details)

export const unauthorized = (message = "Could not validate credentials") =>
  new AppError("unauthorized", 401, message)

export const forbidden = (message: string) => new AppError("forbidden", 403, message)

export const rateLimited = (limitPerHour: number) =>
  new AppError("rate_limited", 429, `Rate limit of ${limitPerHour} requests per hour exceeded`)

/**
 * Failure talking to the embedding / completion provider.
 * `status` is the upstream HTTP status when there was one.
 */
export class ProviderError extends Error {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.name = "ProviderError"
    this.status = status
  }
}

export const providerFailure = (stage: string, cause: unknown) =>
  new AppError("provider_error", 502, `${stage} failed: ${errorMessage(cause)}`)

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return typeof e === "string" ? e : "UNKNOWN_ERROR"
}
