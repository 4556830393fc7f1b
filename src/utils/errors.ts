/**
 * Standard error classes for Schemawright
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  INTAKE_PARSE_ERROR = "INTAKE_PARSE_ERROR",
  NORMALIZATION_ERROR = "NORMALIZATION_ERROR",
  VALIDATION_FAILED = "VALIDATION_FAILED",
  SYNTHESIS_ERROR = "SYNTHESIS_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class SchemawrightError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SchemawrightError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Upstream text could not be turned into a JSON object, even after repair
 */
export class IntakeParseError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INTAKE_PARSE_ERROR, message, details, options);
    this.name = "IntakeParseError";
  }
}

/**
 * Parsed document lacks the shape every schema needs (no entities array)
 */
export class NormalizationError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.NORMALIZATION_ERROR, message, details, options);
    this.name = "NormalizationError";
  }
}

/**
 * Schema has blocking validation errors, so nothing was synthesized
 */
export class ValidationFailedError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_FAILED, message, details, options);
    this.name = "ValidationFailedError";
  }
}

/**
 * Defect in the synthesizer's own tables or bookkeeping. Never caused by user input.
 */
export class SynthesisError extends SchemawrightError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SYNTHESIS_ERROR, message, details, options);
    this.name = "SynthesisError";
  }
}

/**
 * Wrap anything thrown into a SchemawrightError
 */
export function toSchemawrightError(error: unknown): SchemawrightError {
  if (error instanceof SchemawrightError) {
    return error;
  }
  return new SchemawrightError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
