import type { ReferenceCountFinding } from "./Finding.types";
import { extractCitationKeys } from "./CitationAnalyzer";

/**
 * Checks that a manuscript cites at least `minReferences` distinct works.
 */
export function analyzeReferenceCount(text: string, minReferences: number): ReferenceCountFinding {
  const citations = extractCitationKeys(text);
  const uniqueCitations = new Set(citations).size;
  const issues =
    uniqueCitations < minReferences
      ? [`Only ${uniqueCitations} unique references cited, at least ${minReferences} recommended`]
      : [];

  return {
    hasIssues: issues.length > 0,
    issues,
    citationsFound: citations.length,
    uniqueCitations,
    minReferences,
  };
}
