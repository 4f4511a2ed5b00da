import type { Plugin, IAgentRuntime } from "@elizaos/core";
import { getSerperApiKey } from "./config/settings";
import { logger } from "./utils/logger";

import { VerifyPaperAction } from "./actions/verifyPaperAction";
import { VerifySparseContentAction } from "./actions/verifySparseContentAction";
import { VerifyStereotypeContentAction } from "./actions/verifyStereotypeContentAction";
import { VerifyBibReferencesAction } from "./actions/verifyBibReferencesAction";
import { VerifyReferenceCountAction } from "./actions/verifyReferenceCountAction";
import { HealthCheckAction } from "./actions/healthCheckAction";

async function initPlugin(_config: Record<string, string>, runtime: IAgentRuntime): Promise<void> {
  logger.info("Paper verification plugin loaded");
  if (!getSerperApiKey(runtime)) {
    logger.warn("SERPER_API_KEY not found; bibliography verification will report every entry as failed");
  } else {
    logger.info("Serper API key configured");
  }
}

export const paperVerificationPlugin: Plugin = {
  name: "plugin-paper-verification",
  description:
    "Academic paper verification - checks Markdown manuscripts for sparse or list-heavy prose, " +
    "stereotyped phrasing, bare math, malformed citations, unusable images and code blocks, " +
    "and corroborates BibTeX references against web search.",
  init: initPlugin,
  actions: [
    VerifyPaperAction,
    VerifySparseContentAction,
    VerifyStereotypeContentAction,
    VerifyBibReferencesAction,
    VerifyReferenceCountAction,
    HealthCheckAction,
  ],
};

export default paperVerificationPlugin;

// ============================================================================
// RE-EXPORTS (engine usable without an agent runtime)
// ============================================================================

export {
  verifyPaper,
  runTextAnalyzers,
  summarizeResults,
  countFailedChecks,
  ANALYZER_NAMES,
  type VerificationInput,
  type VerificationDeps,
} from "./services/VerificationEngine";

export { analyzeSparsity, isListLike } from "./services/SparsityAnalyzer";
export { analyzeStereotypes, STEREOTYPE_PHRASES } from "./services/StereotypeAnalyzer";
export { analyzeFormulas, GREEK_LETTERS, MATH_SYMBOLS } from "./services/FormulaAnalyzer";
export { analyzeCitations, extractCitationKeys, type BibliographyKeys } from "./services/CitationAnalyzer";
export { analyzeImages, type ImageAnalysisContext } from "./services/ImageAnalyzer";
export { analyzeCodeBlocks } from "./services/CodeBlockAnalyzer";
export { analyzeReferenceCount } from "./services/ReferenceCountAnalyzer";
export { analyzeBibliography, type BibliographySource } from "./services/BibliographyAnalyzer";
export { parseBibtex, bibliographyKeys, type BibliographyEntry } from "./services/BibtexParser";
export {
  SerperSearchClient,
  buildReferenceQuery,
  type LookupResult,
  type SearchMatch,
  type ReferenceSearchClient,
} from "./services/SerperSearchService";
export { renderMarkdownReport, renderErrorReport } from "./services/ReportRenderer";

export type {
  Finding,
  SparsityFinding,
  StereotypeFinding,
  FormulaFinding,
  CitationFinding,
  ImageFinding,
  CodeBlockFinding,
  BibliographyFinding,
  ReferenceCountFinding,
  VerificationResults,
  VerificationReport,
  AnalyzerName,
} from "./services/Finding.types";

export {
  PaperVerificationError,
  PaperVerificationNetworkError,
  PaperVerificationValidationError,
  BibliographyParseError,
  ErrorCode,
  wrapError,
  isPaperVerificationError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./errors";

export { logger, type LogLevel, type LogEntry } from "./utils/logger";
