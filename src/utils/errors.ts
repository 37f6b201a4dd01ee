/**
 * Standard error classes for reid-risk
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  INVALID_INPUT = "INVALID_INPUT",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  DATA_SOURCE_ERROR = "DATA_SOURCE_ERROR",
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

export class ReidRiskError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ReidRiskError";
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
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause !== undefined ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * A value outside a generalizer's domain, an attribute missing from the
 * store schema, or a malformed threshold.
 */
export class InvalidInputError extends ReidRiskError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INVALID_INPUT, message, details, options);
    this.name = "InvalidInputError";
  }
}

export class ConfigError extends ReidRiskError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends ReidRiskError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class InputReadError extends ReidRiskError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

export class DataSourceError extends ReidRiskError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.DATA_SOURCE_ERROR, message, details, options);
    this.name = "DataSourceError";
  }
}

/**
 * Wrap anything thrown into a ReidRiskError, keeping coded errors as they are
 */
export function toReidRiskError(error: unknown): ReidRiskError {
  if (error instanceof ReidRiskError) {
    return error;
  }
  return new ReidRiskError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
