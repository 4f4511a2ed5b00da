/**
 * CitationAnalyzer: Checks `[@key]` citation markers.
 *
 * When a document has no `[@key]` marker at all, nothing else is checked.
 */

import type { CitationFinding } from "./Finding.types";
import { stripImages } from "./paragraphs";

/** Keys from a parsed bibliography, or the reason it could not be read */
export type BibliographyKeys =
  | { keys: ReadonlySet<string> }
  | { error: string };

const CITATION_RE = /\[@([^\]]+)\]/g;
const NON_CITATION_BRACKET_RE = /\[(?!@)([^\]]*)\]/g;

export function extractCitationKeys(text: string): string[] {
  return Array.from(text.matchAll(CITATION_RE), m => m[1]);
}

/** Numeric references like [3] and link text containing "http" are not citation mistakes. */
function isExemptBracket(content: string): boolean {
  return /^\d+$/.test(content) || content.includes("http");
}

export function analyzeCitations(text: string, bibliography?: BibliographyKeys): CitationFinding {
  const citations = extractCitationKeys(text);

  if (citations.length === 0) {
    return { hasIssues: false, issues: [], citationsFound: 0, uniqueCitations: 0 };
  }

  const issues: string[] = [];

  for (const match of stripImages(text).matchAll(NON_CITATION_BRACKET_RE)) {
    const content = match[1];
    if (isExemptBracket(content)) continue;
    issues.push(`Non-standard citation format: [${content}], use [@key]`);
  }

  if (bibliography) {
    if ("error" in bibliography) {
      issues.push(`Failed to read bibliography: ${bibliography.error}`);
    } else {
      for (const key of citations) {
        if (!bibliography.keys.has(key)) {
          issues.push(`Citation [@${key}] does not exist in the bibliography`);
        }
      }
    }
  }

  return {
    hasIssues: issues.length > 0,
    issues,
    citationsFound: citations.length,
    uniqueCitations: new Set(citations).size,
  };
}
