export {
  PaperVerificationError,
  ErrorCode,
  wrapError,
  isPaperVerificationError,
  getErrorCode,
  errorMessage,
  type ErrorContext,
  type SerializedError,
} from "./PaperVerificationError";

export { PaperVerificationNetworkError } from "./NetworkError";
export { PaperVerificationValidationError } from "./ValidationError";
export { BibliographyParseError } from "./ParseError";
