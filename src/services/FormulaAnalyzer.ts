/**
 * FormulaAnalyzer: Reports math written outside of LaTeX delimiters.
 *
 * Any line containing "$" is treated as already in math mode and skipped entirely,
 * even when the dollar sign is unrelated. Image syntax is removed before scanning.
 * Issues are ordered by pass (Greek letters, symbols, expressions), then by line.
 */

import type { FormulaFinding } from "./Finding.types";
import { stripImages } from "./paragraphs";

function codePointRange(from: number, to: number, skip: number): string[] {
  const out: string[] = [];
  for (let cp = from; cp <= to; cp++) {
    if (cp !== skip) out.push(String.fromCodePoint(cp));
  }
  return out;
}

/** α..ω (without final sigma ς) followed by Α..Ω (without the unassigned U+03A2) */
export const GREEK_LETTERS: readonly string[] = [
  ...codePointRange(0x03b1, 0x03c9, 0x03c2),
  ...codePointRange(0x0391, 0x03a9, 0x03a2),
];

export const MATH_SYMBOLS: readonly string[] = ["∑", "∏", "∫", "∞", "≤", "≥", "≠", "±", "∝", "∈", "∀", "∃"];

// Word boundaries are Unicode-aware: a CJK character directly before the variable suppresses the match.
const NOT_AFTER_WORD = "(?<![\\p{L}\\p{N}_])";

export const EXPRESSION_PATTERNS: readonly RegExp[] = [
  new RegExp(`${NOT_AFTER_WORD}[a-zA-Z]\\s*=\\s*[a-zA-Z0-9+\\-*/^()]+`, "u"), // x = y + 1
  new RegExp(`${NOT_AFTER_WORD}[a-zA-Z]+\\s*\\^\\s*[0-9]+`, "u"), // x^2
  new RegExp(`${NOT_AFTER_WORD}[a-zA-Z]+_[a-zA-Z0-9]+`, "u"), // x_i
];

interface ScanLine {
  lineNumber: number;
  text: string;
}

function scannableLines(text: string): ScanLine[] {
  const out: ScanLine[] = [];
  text.split("\n").forEach((line, i) => {
    if (line.includes("$")) return;
    out.push({ lineNumber: i + 1, text: stripImages(line) });
  });
  return out;
}

export function analyzeFormulas(text: string): FormulaFinding {
  const lines = scannableLines(text);
  const issues: string[] = [];

  for (const { lineNumber, text: line } of lines) {
    for (const letter of GREEK_LETTERS) {
      if (line.includes(letter)) {
        issues.push(`Line ${lineNumber}: bare Greek letter '${letter}' found, use LaTeX notation`);
      }
    }
  }

  for (const { lineNumber, text: line } of lines) {
    for (const symbol of MATH_SYMBOLS) {
      if (line.includes(symbol)) {
        issues.push(`Line ${lineNumber}: bare math symbol '${symbol}' found, use LaTeX notation`);
      }
    }
  }

  for (const { lineNumber, text: line } of lines) {
    if (EXPRESSION_PATTERNS.some(re => re.test(line))) {
      issues.push(`Line ${lineNumber}: possible math expression found, wrap it in LaTeX delimiters`);
    }
  }

  return { hasIssues: issues.length > 0, issues };
}
