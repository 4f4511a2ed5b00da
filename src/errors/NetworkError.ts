import { PaperVerificationError, ErrorCode, type ErrorContext } from "./PaperVerificationError";

/**
 * Error for search API failures (credential, HTTP status, transport, response body).
 * The endpoint and status travel in `context` for the log line.
 */
export class PaperVerificationNetworkError extends PaperVerificationError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, options);
    this.name = "PaperVerificationNetworkError";
  }

  static missingCredential(settingName: string, context: Partial<ErrorContext> = {}) {
    return new PaperVerificationNetworkError(
      `${settingName} not provided`,
      ErrorCode.SEARCH_CREDENTIAL_MISSING,
      { ...context, setting: settingName }
    );
  }

  static httpStatus(endpoint: string, statusCode: number, context: Partial<ErrorContext> = {}) {
    return new PaperVerificationNetworkError(
      `API request failed with status ${statusCode}`,
      ErrorCode.SEARCH_HTTP_ERROR,
      { ...context, endpoint, statusCode }
    );
  }

  static requestFailed(endpoint: string, cause: Error, context: Partial<ErrorContext> = {}) {
    const code = cause.name === "TimeoutError" ? ErrorCode.NETWORK_TIMEOUT : ErrorCode.NETWORK_CONNECTION_FAILED;
    return new PaperVerificationNetworkError(
      `Search request failed: ${cause.message}`,
      code,
      { ...context, endpoint },
      { cause }
    );
  }

  static invalidResponse(endpoint: string, cause: Error, context: Partial<ErrorContext> = {}) {
    return new PaperVerificationNetworkError(
      `Search request failed: ${cause.message}`,
      ErrorCode.SEARCH_INVALID_RESPONSE,
      { ...context, endpoint },
      { cause }
    );
  }
}
