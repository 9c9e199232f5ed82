// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "GENERATION_FAILED"
  | "EMBEDDING_FAILED"
  | "RETRIEVAL_FAILED"
  | "INGESTION_FAILED"
  | "EXTRACTION_FAILED"
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class ClinicError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "ClinicError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** Create a configuration error */
export function configError(message: string, context?: Record<string, unknown>): ClinicError {
  return new ClinicError({
    code: "CONFIG_ERROR",
    message,
    context,
  });
}

/** Create a generation-service error */
export function generationError(message: string, cause?: unknown): ClinicError {
  return new ClinicError({
    code: "GENERATION_FAILED",
    message,
    cause,
  });
}

/** Create an embedding-service error */
export function embeddingError(message: string, cause?: unknown): ClinicError {
  return new ClinicError({
    code: "EMBEDDING_FAILED",
    message,
    cause,
  });
}

/** Create a vector index / retrieval error */
export function retrievalError(message: string, cause?: unknown, context?: Record<string, unknown>): ClinicError {
  return new ClinicError({
    code: "RETRIEVAL_FAILED",
    message,
    cause,
    context,
  });
}

/** Create an ingestion error */
export function ingestionError(
  code: "INGESTION_FAILED" | "EXTRACTION_FAILED",
  message: string,
  cause?: unknown,
  context?: Record<string, unknown>
): ClinicError {
  return new ClinicError({
    code,
    message,
    cause,
    context,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): ClinicError {
  if (err instanceof ClinicError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ClinicError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** User-friendly error messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "GENERATION_FAILED":
      return "I'm having trouble answering right now. Please try again in a moment.";
    case "RETRIEVAL_FAILED":
      return "I couldn't search our medical knowledge base. Please try again.";
    case "VALIDATION_ERROR":
      return "I couldn't understand those appointment details. Could you rephrase them?";
    default:
      return "Something went wrong. Please try again.";
  }
}
