/**
 * Error Types
 *
 * Every error carries a string code so callers (and the API layer) can
 * branch without instanceof chains. Lifecycle misuse is returned as a
 * Result; ingestion and analytics failures are absorbed where they occur.
 */

export type ErrorCode =
  | "MALFORMED_MESSAGE"
  | "CONNECTION_FAILURE"
  | "ALREADY_RUNNING"
  | "NOT_RUNNING"
  | "NO_SYMBOLS"
  | "INVALID_CONDITION"
  | "CONDITION_EVAL"
  | "STORAGE";

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raw feed message could not be turned into a tick */
export class MalformedMessageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MALFORMED_MESSAGE", message, options);
  }
}

/** Transport-level failure on one symbol's connection */
export class ConnectionFailureError extends PipelineError {
  readonly symbol: string;

  constructor(symbol: string, message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILURE", message, options);
    this.symbol = symbol;
  }
}

export type CollectorErrorCode = Extract<ErrorCode, "ALREADY_RUNNING" | "NOT_RUNNING" | "NO_SYMBOLS">;

/** Collector lifecycle misuse */
export class CollectorError extends PipelineError {
  declare readonly code: CollectorErrorCode;

  constructor(code: CollectorErrorCode, message: string) {
    super(code, message);
  }
}

/** Alert condition failed to parse */
export class ConditionParseError extends PipelineError {
  /** Character offset of the offending token */
  readonly position: number;

  constructor(message: string, position: number) {
    super("INVALID_CONDITION", message);
    this.position = position;
  }
}

/** Alert condition failed to evaluate against a context */
export class ConditionEvalError extends PipelineError {
  constructor(message: string) {
    super("CONDITION_EVAL", message);
  }
}

/** Storage collaborator failure */
export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE", message, options);
  }
}

export type Result<T, E extends Error = PipelineError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
