export type ErrorCode =
  | "CONFIG_INVALID"
  | "INPUT_INVALID"
  | "STORAGE_FAILED"
  | "AI_CALL_FAILED"
  | "AI_PARSE_FAILED"
  | "AI_VALIDATION_FAILED";

/** Coarse classification surfaced to the user after a task fails. */
export type ErrorCategory = "AI_ERROR" | "VECTOR_ERROR" | "UNKNOWN_ERROR";

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** Missing or malformed credentials/settings. Fatal at startup. */
export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

/** Rejected before any remote call is made. */
export class InputValidationError extends PipelineError {
  constructor(message: string) {
    super("INPUT_INVALID", message);
    this.name = "InputValidationError";
  }
}

/** Collection failure. The library error stays on `cause`, never in the message. */
export class StorageError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_FAILED", message, { cause });
    this.name = "StorageError";
  }
}

export type AiErrorKind = "transport" | "parse" | "validation";

const AI_CODES: Record<AiErrorKind, ErrorCode> = {
  transport: "AI_CALL_FAILED",
  parse: "AI_PARSE_FAILED",
  validation: "AI_VALIDATION_FAILED",
};

export class AiError extends PipelineError {
  readonly kind: AiErrorKind;

  constructor(kind: AiErrorKind, message: string) {
    super(AI_CODES[kind], message);
    this.name = "AiError";
    this.kind = kind;
  }
}

export function categorize(err: unknown): ErrorCategory {
  if (err instanceof AiError) return "AI_ERROR";
  if (err instanceof StorageError) return "VECTOR_ERROR";
  return "UNKNOWN_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
