// ─── Engine Errors ─────────────────────────────────────────────────
// Exceptional conditions only. Rule violations are returned as values
// (see ActionValidationResult) and never thrown.

export enum EngineErrorCode {
  INVALID_REFERENCE = "INVALID_REFERENCE",
  CONFIGURATION_GAP = "CONFIGURATION_GAP",
  LIVENESS_HAZARD = "LIVENESS_HAZARD",
  DATA_PARSE = "DATA_PARSE",
  INVALID_SETUP = "INVALID_SETUP",
}

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly metadata?: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    code: EngineErrorCode,
    metadata?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.metadata = metadata;
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      metadata: this.metadata,
    };
  }
}

/**
 * Thrown when a game data file fails schema validation.
 * Carries one `path: message` line per Zod issue.
 */
export class DataParseError extends EngineError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[]) {
    super(message, EngineErrorCode.DATA_PARSE, { issues });
    this.name = "DataParseError";
    this.issues = issues;
    Object.setPrototypeOf(this, DataParseError.prototype);
  }
}
