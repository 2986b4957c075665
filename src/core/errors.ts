/**
 * Error Classes for cfg-lens
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Response parsing errors (2xxx)
  RESPONSE_MALFORMED = "E2000",

  // Graph structure errors (3xxx)
  GRAPH_DANGLING_EDGE = "E3000",

  // Cache storage errors (4xxx)
  STORAGE_UNAVAILABLE = "E4000",
  STORAGE_READ_FAILED = "E4001",
  STORAGE_MIGRATION_FAILED = "E4003",

  // Inference errors (6xxx)
  LLM_CONNECTION_FAILED = "E6000",
  LLM_INFERENCE_FAILED = "E6001",
  LLM_TIMEOUT = "E6003",
  LLM_EMPTY_RESPONSE = "E6004",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all cfg-lens errors
 */
export class CfgLensError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CfgLensError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * The inference collaborator could not be reached or refused the request
 * (network, quota, auth, timeout). Never cached, never retried here.
 */
export class TransportError extends CfgLensError {
  public readonly model?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LLM_INFERENCE_FAILED,
    context?: Record<string, unknown> & { model?: string }
  ) {
    super(message, code, context);
    this.name = "TransportError";
    this.model = context?.model;
  }
}

/**
 * Model output that could not be parsed into a record at all
 */
export class MalformedResponseError extends CfgLensError {
  public readonly preview?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RESPONSE_MALFORMED,
    context?: Record<string, unknown> & { preview?: string }
  ) {
    super(message, code, context);
    this.name = "MalformedResponseError";
    this.preview = context?.preview;
  }
}

/**
 * A validated graph record whose node ids are not unique, or whose edges
 * point at node ids it does not contain
 */
export class StructuralError extends CfgLensError {
  public readonly danglingIds: string[];
  public readonly duplicateIds: string[];

  constructor(
    message: string,
    ids: { danglingIds?: string[]; duplicateIds?: string[] },
    context?: Record<string, unknown>
  ) {
    const danglingIds = ids.danglingIds ?? [];
    const duplicateIds = ids.duplicateIds ?? [];
    super(message, ErrorCode.GRAPH_DANGLING_EDGE, { ...context, danglingIds, duplicateIds });
    this.name = "StructuralError";
    this.danglingIds = danglingIds;
    this.duplicateIds = duplicateIds;
  }
}

/**
 * Failure in the cache store's underlying I/O. Logged by the store, never
 * raised past it.
 */
export class StorageFault extends CfgLensError {
  public readonly operation?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_UNAVAILABLE,
    context?: Record<string, unknown> & { operation?: string }
  ) {
    super(message, code, context);
    this.name = "StorageFault";
    this.operation = context?.operation;
  }
}

/**
 * Invalid process configuration detected at startup
 */
export class ConfigurationError extends CfgLensError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Check if an error is a CfgLensError
 */
export function isCfgLensError(error: unknown): error is CfgLensError {
  return error instanceof CfgLensError;
}

/**
 * Wrap an unknown error in a CfgLensError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): CfgLensError {
  if (isCfgLensError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new CfgLensError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new CfgLensError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
