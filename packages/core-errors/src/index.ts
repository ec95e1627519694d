export enum FortuneErrorCode {
  DATA_LOAD_FAILED = "DATA_LOAD_FAILED",
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
  INVALID_MOVE = "INVALID_MOVE",
  INVALID_WHEEL = "INVALID_WHEEL",
  INVALID_PHRASE_DATA = "INVALID_PHRASE_DATA",
  UNEXPECTED = "UNEXPECTED",
}

export type DataLoadReason = "RESOURCE_MISSING" | "MALFORMED";

export type InvalidMoveReason = "EMPTY_MOVE" | "ALREADY_GUESSED" | "VOWEL_UNAFFORDABLE";

export interface FortuneErrorPayload {
  error: FortuneErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class FortuneError extends Error {
  constructor(public readonly code: FortuneErrorCode, message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "FortuneError";
  }
}

export class DataLoadError extends FortuneError {
  constructor(public readonly reason: DataLoadReason, public readonly resource: string, message: string) {
    super(FortuneErrorCode.DATA_LOAD_FAILED, message, { reason, resource });
    this.name = "DataLoadError";
  }
}

export class ConfigurationError extends FortuneError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(FortuneErrorCode.CONFIGURATION_INVALID, message, details);
    this.name = "ConfigurationError";
  }
}

/** Raised by move validation; the engine recovers locally and re-prompts. */
export class InvalidMoveError extends FortuneError {
  constructor(public readonly reason: InvalidMoveReason, message: string, public readonly move: string) {
    super(FortuneErrorCode.INVALID_MOVE, message, { reason, move });
    this.name = "InvalidMoveError";
  }
}

export class InvalidWheelError extends FortuneError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(FortuneErrorCode.INVALID_WHEEL, message, details);
    this.name = "InvalidWheelError";
  }
}

export class InvalidPhraseDataError extends FortuneError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(FortuneErrorCode.INVALID_PHRASE_DATA, message, details);
    this.name = "InvalidPhraseDataError";
  }
}

export class UnexpectedError extends FortuneError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(FortuneErrorCode.UNEXPECTED, message);
    this.name = "UnexpectedError";
  }
}

export function fortuneErrorPayload(code: FortuneErrorCode, message: string, details?: Record<string, unknown>): FortuneErrorPayload {
  return { error: code, message, details };
}

export function toFortuneError(err: unknown): FortuneError {
  if (err instanceof FortuneError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UnexpectedError(`Unexpected error: ${message}`, err);
}

/** Setup-time failures that abort the game before any turn is played. */
export function isSetupError(err: FortuneError): boolean {
  return (
    err.code === FortuneErrorCode.DATA_LOAD_FAILED ||
    err.code === FortuneErrorCode.CONFIGURATION_INVALID ||
    err.code === FortuneErrorCode.INVALID_WHEEL ||
    err.code === FortuneErrorCode.INVALID_PHRASE_DATA
  );
}
