export class PerfstatError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "PerfstatError";
  }
}

/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  DISCOVERY_ERROR: "DISCOVERY_ERROR",
  PARSE_ERROR: "PARSE_ERROR",
  UNKNOWN_MODE: "UNKNOWN_MODE",
  EMPTY_GROUP: "EMPTY_GROUP",
  INVALID_JSON: "INVALID_JSON",
  SCHEMA_VALIDATION: "SCHEMA_VALIDATION",
  FILE_NOT_FOUND: "FILE_NOT_FOUND",
  CONFIG_ERROR: "CONFIG_ERROR",
  AGGREGATOR_FINALIZED: "AGGREGATOR_FINALIZED",
  WRAPPED_ERROR: "WRAPPED_ERROR",

  // Artifact read errors (for permission/I/O issues)
  ARTIFACT_READ_ERROR: "ARTIFACT_READ_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Thrown when the results root is missing or cannot be listed.
 */
export class DiscoveryError extends PerfstatError {
  constructor(
    public readonly root: string,
    message: string,
  ) {
    super(message, ErrorCodes.DISCOVERY_ERROR);
    this.name = "DiscoveryError";
  }
}

/**
 * Thrown by the format parsers on a malformed line or field.
 * `line` is 1-based when the failure can be pinned to a line.
 */
export class ParseError extends PerfstatError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly line?: number,
  ) {
    super(
      line !== undefined
        ? `${source}:${line}: ${message}`
        : `${source}: ${message}`,
      ErrorCodes.PARSE_ERROR,
    );
    this.name = "ParseError";
  }
}

export class UnknownModeError extends PerfstatError {
  constructor(
    public readonly source: string,
    public readonly mode: string,
  ) {
    super(`unknown mode: ${mode}`, ErrorCodes.UNKNOWN_MODE);
    this.name = "UnknownModeError";
  }
}

export class EmptyGroupError extends PerfstatError {
  constructor(public readonly groupId: string) {
    super(
      `Group '${groupId}' has no samples; statistics are undefined`,
      ErrorCodes.EMPTY_GROUP,
    );
    this.name = "EmptyGroupError";
  }
}

export class InvalidJsonError extends PerfstatError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_JSON);
    this.name = "InvalidJsonError";
  }
}

export class SchemaValidationError extends PerfstatError {
  constructor(message: string) {
    super(message, ErrorCodes.SCHEMA_VALIDATION);
    this.name = "SchemaValidationError";
  }
}

export class FileNotFoundError extends PerfstatError {
  constructor(message: string) {
    super(message, ErrorCodes.FILE_NOT_FOUND);
    this.name = "FileNotFoundError";
  }
}

export class ConfigError extends PerfstatError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

export class AggregatorFinalizedError extends PerfstatError {
  constructor() {
    super(
      "Aggregator already finalized; no further samples can be added",
      ErrorCodes.AGGREGATOR_FINALIZED,
    );
    this.name = "AggregatorFinalizedError";
  }
}

/**
 * Thrown when an artifact exists but cannot be read due to permission or I/O errors.
 * This distinguishes "file cannot be accessed" from "file does not exist" (FileNotFoundError).
 */
export class ArtifactReadError extends PerfstatError {
  constructor(
    public readonly filePath: string,
    public readonly cause: Error,
  ) {
    super(
      `Cannot read artifact ${filePath}: ${cause.message}`,
      ErrorCodes.ARTIFACT_READ_ERROR,
    );
    this.name = "ArtifactReadError";
  }
}

export function isPerfstatError(error: unknown): error is PerfstatError {
  return error instanceof PerfstatError;
}

export function toExitCode(error: unknown): number {
  if (error === null || error === undefined) {
    return 0;
  }
  return 1;
}

export function wrapError(error: unknown, context: string): PerfstatError {
  if (error instanceof PerfstatError) {
    return new PerfstatError(`${context}: ${error.message}`, error.code);
  }

  if (error instanceof Error) {
    return new PerfstatError(
      `${context}: ${error.message}`,
      ErrorCodes.WRAPPED_ERROR,
    );
  }

  return new PerfstatError(
    `${context}: ${String(error)}`,
    ErrorCodes.WRAPPED_ERROR,
  );
}
