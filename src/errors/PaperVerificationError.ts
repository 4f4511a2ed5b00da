/**
 * Base error class for all paper verification errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Network errors (2xxx)
  NETWORK_TIMEOUT = 2001,
  NETWORK_CONNECTION_FAILED = 2002,
  SEARCH_CREDENTIAL_MISSING = 2010,
  SEARCH_HTTP_ERROR = 2011,
  SEARCH_INVALID_RESPONSE = 2012,

  // Validation errors (4xxx)
  VALIDATION_MISSING_PARAM = 4003,
  VALIDATION_FILE_NOT_FOUND = 4005,

  // Parse errors (5xxx)
  BIBTEX_UNREADABLE = 5001,

  // Storage errors (6xxx)
  STORAGE_READ_FAILED = 6002,

  // General errors (9xxx)
  UNKNOWN = 9999,
}

export interface ErrorContext {
  operation: string;
  filePath?: string;
  endpoint?: string;
  entryKey?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

/**
 * Base error class for the plugin.
 * All plugin-specific errors should extend this class.
 */
export class PaperVerificationError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = "PaperVerificationError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }

  toUserMessage(): string {
    return this.message;
  }

  /**
   * Create detailed error message for logging.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.filePath) parts.push(`File: ${this.context.filePath}`);
    if (this.context.endpoint) parts.push(`Endpoint: ${this.context.endpoint}`);
    if (this.cause) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in PaperVerificationError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): PaperVerificationError {
  if (error instanceof PaperVerificationError) {
    return new PaperVerificationError(
      error.message,
      error.code,
      { ...error.context, ...context },
      { cause: error.cause }
    );
  }

  if (error instanceof Error) {
    return new PaperVerificationError(error.message, code, context, { cause: error });
  }

  return new PaperVerificationError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isPaperVerificationError(error: unknown): error is PaperVerificationError {
  return error instanceof PaperVerificationError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isPaperVerificationError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

/** Message text of any thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
