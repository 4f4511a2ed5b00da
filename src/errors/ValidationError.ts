import { PaperVerificationError, ErrorCode, type ErrorContext } from "./PaperVerificationError";

/**
 * Error for action input validation failures.
 */
export class PaperVerificationValidationError extends PaperVerificationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_MISSING_PARAM,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "PaperVerificationValidationError";
  }

  static missingParam(paramName: string, context: Partial<ErrorContext> = {}) {
    return new PaperVerificationValidationError(
      `Missing required parameter: ${paramName}`,
      ErrorCode.VALIDATION_MISSING_PARAM,
      { ...context, field: paramName }
    );
  }

  static fileNotFound(filePath: string, context: Partial<ErrorContext> = {}) {
    return new PaperVerificationValidationError(
      `File does not exist: ${filePath}`,
      ErrorCode.VALIDATION_FILE_NOT_FOUND,
      { ...context, filePath }
    );
  }
}
