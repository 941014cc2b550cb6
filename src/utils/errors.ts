/**
 * Standard error classes for miabis-synth
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  IO_FAILURE = "IO_FAILURE",
  GENERATION_ERROR = "GENERATION_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class SynthError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SynthError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
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

/**
 * Raised before any generation work when the run configuration is unusable
 */
export class InvalidConfigurationError extends SynthError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INVALID_CONFIGURATION, message, details, options);
    this.name = "InvalidConfigurationError";
  }
}

export class IOFailureError extends SynthError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.IO_FAILURE, message, details, options);
    this.name = "IOFailureError";
  }
}

export class GenerationError extends SynthError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.GENERATION_ERROR, message, details, options);
    this.name = "GenerationError";
  }
}

export function isSynthError(error: unknown): error is SynthError {
  return error instanceof SynthError;
}
