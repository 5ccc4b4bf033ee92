export type ValidationErrorCode =
  | "NotFound"
  | "NotARegularFile"
  | "Empty"
  | "TooLarge"
  | "UnsupportedType"
  | "TypeMismatch"
  | "UnsafePath"
  | "PermissionDenied";

export type LoadErrorCode = "EmptyContent" | "ParseFailed";

export type StoreWritePhase = "cleanup" | "summary" | "chunks";

export type RetrievalStage = "coarse" | "fine";

export type ErrorDetails = Record<string, string | number | boolean | null>;

export interface ErrorPayload {
  error: string;
  code: string;
  message: string;
  retryable: boolean;
  details: ErrorDetails;
}

/**
 * Base class for every failure the indexing core reports to its callers.
 * Subclasses carry a stable `code` and structured `details` so the outer
 * surface can render a specific message instead of a stack trace.
 */
export abstract class DocumentIndexError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    public readonly details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorPayload {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export class ValidationError extends DocumentIndexError {
  declare readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, code, false, details);
  }
}

export class LoadError extends DocumentIndexError {
  declare readonly code: LoadErrorCode;

  constructor(
    code: LoadErrorCode,
    message: string,
    details: ErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, code, false, details, options);
  }
}

export class StoreWriteError extends DocumentIndexError {
  constructor(
    public readonly phase: StoreWritePhase,
    public readonly sourceId: string,
    public readonly summaryStored: boolean,
    public readonly chunksStored: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Vector store write failed during ${phase} phase for ${sourceId}: ${causeMessage(options?.cause)}`,
      "StoreWriteFailed",
      true,
      { phase, sourceId, summaryStored, chunksStored },
      options,
    );
  }
}

export class RetrievalError extends DocumentIndexError {
  constructor(
    public readonly stage: RetrievalStage,
    sourceId: string | null,
    options?: { cause?: unknown },
  ) {
    super(
      `Vector store search failed during ${stage} stage: ${causeMessage(options?.cause)}`,
      "RetrievalFailed",
      true,
      { stage, sourceId },
      options,
    );
  }
}

export class ChunkingError extends DocumentIndexError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "InvalidChunkingOptions", false, details);
  }
}

export class InvalidRequestError extends DocumentIndexError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "InvalidRequest", false, details);
  }
}

export class InvalidFilterError extends DocumentIndexError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "InvalidFilter", false, details);
  }
}

export function describeError(error: unknown): ErrorPayload {
  if (error instanceof DocumentIndexError) {
    return error.toJSON();
  }
  return {
    error: error instanceof Error ? error.name : "Error",
    code: "Internal",
    message: error instanceof Error ? error.message : "unknown error",
    retryable: false,
    details: {},
  };
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}
