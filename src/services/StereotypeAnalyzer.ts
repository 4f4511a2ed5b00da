/**
 * StereotypeAnalyzer: Detects boilerplate transitions and stock bold headings.
 *
 * Works on coarse blank-line blocks (headings included), not on the prose
 * paragraphs used by the sparsity check.
 */

import { STEREOTYPE_DEFAULTS } from "../config/constants";
import type { StereotypeFinding } from "./Finding.types";
import { splitBlocks } from "./paragraphs";

export const STEREOTYPE_PHRASES: readonly string[] = [
  "首先，",
  "其次，",
  "再次，",
  "最后，",
  "再者，",
  "综上所述，",
  "值得注意的是，",
  "总而言之，",
  "换句话说，",
  "毫无疑问，",
  "显而易见，",
  "众所周知，",
];

const N = STEREOTYPE_DEFAULTS.MAX_BOLD_HEADING_CHARS;

interface BoldHeadingPattern {
  pattern: RegExp;
  description: string;
}

/** Tested in order; the first match wins for a block */
export const BOLD_HEADING_PATTERNS: readonly BoldHeadingPattern[] = [
  {
    pattern: new RegExp(`^\\*\\*(.{1,${N}})\\*\\*[：:]`, "u"),
    description: "paragraph opens with a bold phrase and colon",
  },
  {
    pattern: new RegExp(`^\\d+\\.\\s*\\*\\*(.{1,${N}})\\*\\*[：:]`, "u"),
    description: "numbered item with bold heading",
  },
  {
    pattern: new RegExp(`^\\s*-\\s*\\*\\*(.{1,${N}})\\*\\*[：:]`, "u"),
    description: "bullet item with bold heading",
  },
];

export function analyzeStereotypes(text: string): StereotypeFinding {
  const paragraphs = splitBlocks(text);
  const found: string[] = [];
  let affectedParagraphs = 0;

  const record = (expression: string) => {
    if (!found.includes(expression)) found.push(expression);
  };

  for (const paragraph of paragraphs) {
    let affected = false;

    for (const phrase of STEREOTYPE_PHRASES) {
      if (paragraph.includes(phrase)) {
        affected = true;
        record(phrase);
      }
    }

    const heading = BOLD_HEADING_PATTERNS.find(({ pattern }) => pattern.test(paragraph));
    if (heading) {
      affected = true;
      record(heading.description);
    }

    if (affected) affectedParagraphs++;
  }

  const issues = found.length > 0 ? [`Stereotyped expressions found: ${found.join(", ")}`] : [];

  return {
    hasIssues: issues.length > 0,
    issues,
    foundExpressions: found,
    affectedParagraphs,
    totalParagraphs: paragraphs.length,
  };
}
