import type { CodeBlockFinding } from "./Finding.types";

const FENCE = "```";

/**
 * Manuscripts may not contain code. Two independent passes:
 * opening fences (closing fences are silent), then any non-fence line with two or more backticks.
 * Lines inside a fenced block are still subject to the second pass.
 */
export function analyzeCodeBlocks(text: string): CodeBlockFinding {
  const lines = text.split("\n");
  const issues: string[] = [];

  let inBlock = false;
  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed.startsWith(FENCE)) return;
    if (!inBlock) {
      const language = trimmed.slice(FENCE.length).trim() || "unlabelled";
      issues.push(`Line ${i + 1}: ${language} code block found, papers must not contain code blocks`);
    }
    inBlock = !inBlock;
  });

  lines.forEach((line, i) => {
    if (line.trim().startsWith(FENCE)) return;
    const backticks = line.split("`").length - 1;
    if (backticks >= 2) {
      issues.push(`Line ${i + 1}: inline code found, papers must not contain code`);
    }
  });

  return { hasIssues: issues.length > 0, issues };
}
