/**
 * SparsityAnalyzer: Flags documents dominated by short or list-like paragraphs.
 *
 * Pure function over raw text. Each threshold breach adds a fixed penalty to
 * `sparsityScore` and one issue; penalties compound.
 */

import { SPARSITY_THRESHOLDS as T } from "../config/constants";
import type { SparsityFinding } from "./Finding.types";
import { charLength, formatPercent, median, splitProseParagraphs } from "./paragraphs";

/** Any line of the paragraph starting with one of these makes it list-like */
const LIST_PATTERNS: RegExp[] = [
  /^\s*\d+[.)]\s*/m, // 1. / 1)
  /^\s*[a-zA-Z][.)]\s*/m, // a. / a)
  /^\s*[-*+•]\s*/m, // bullets
  /^\s*第\d+[章节条]\s*/m, // 第3章
  /^\s*[一二三四五六七八九十]+[.、]\s*/m, // 一、
];

export function isListLike(paragraph: string): boolean {
  return LIST_PATTERNS.some(re => re.test(paragraph));
}

export function analyzeSparsity(text: string): SparsityFinding {
  const paragraphs = splitProseParagraphs(text, T.MIN_PARAGRAPH_CHARS);

  if (paragraphs.length === 0) {
    return {
      hasIssues: true,
      issues: ["No meaningful paragraphs found"],
      sparsityScore: T.EMPTY_SCORE,
      paragraphCount: 0,
      medianLength: 0,
    };
  }

  const lengths = paragraphs.map(charLength);
  const total = lengths.length;
  const issues: string[] = [];
  let sparsityScore = 0;

  const shortRatio = lengths.filter(n => n < T.SHORT_PARAGRAPH_CHARS).length / total;
  if (shortRatio > T.SHORT_RATIO_LIMIT) {
    issues.push(
      `Too many short paragraphs (${formatPercent(shortRatio)} of paragraphs are under ${T.SHORT_PARAGRAPH_CHARS} characters)`
    );
    sparsityScore += T.SHORT_PENALTY;
  }

  const veryShortRatio = lengths.filter(n => n < T.VERY_SHORT_PARAGRAPH_CHARS).length / total;
  if (veryShortRatio > T.VERY_SHORT_RATIO_LIMIT) {
    issues.push(
      `Too many very short paragraphs (${formatPercent(veryShortRatio)} of paragraphs are under ${T.VERY_SHORT_PARAGRAPH_CHARS} characters)`
    );
    sparsityScore += T.VERY_SHORT_PENALTY;
  }

  const listRatio = paragraphs.filter(isListLike).length / total;
  if (listRatio > T.LIST_RATIO_LIMIT) {
    issues.push(`Too many list-style paragraphs (${formatPercent(listRatio)} of paragraphs are formatted as lists)`);
    sparsityScore += T.LIST_PENALTY;
  }

  return {
    hasIssues: issues.length > 0,
    issues,
    sparsityScore,
    paragraphCount: total,
    medianLength: median(lengths),
  };
}
