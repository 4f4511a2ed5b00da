import { PaperVerificationError, ErrorCode, type ErrorContext } from "./PaperVerificationError";

/**
 * Error for BibTeX input the parser could not read at all.
 */
export class BibliographyParseError extends PaperVerificationError {
  constructor(message: string, code: ErrorCode, context: Partial<ErrorContext> = {}) {
    super(message, code, { operation: "parseBibtex", ...context });
    this.name = "BibliographyParseError";
  }

  static unreadable(detail: string) {
    return new BibliographyParseError(`Unreadable bibliography: ${detail}`, ErrorCode.BIBTEX_UNREADABLE);
  }
}
