import { describe, it, expect } from "vitest";
import { analyzeCodeBlocks } from "../src/services/CodeBlockAnalyzer";

describe("CodeBlockAnalyzer", () => {
  it("reports an opening fence with its language", () => {
    expect(analyzeCodeBlocks("Intro\n```python\nprint(1)\n```\n").issues).toEqual([
      "Line 2: python code block found, papers must not contain code blocks",
    ]);
  });

  it("labels fences without a language", () => {
    expect(analyzeCodeBlocks("```\ncode\n```").issues).toEqual([
      "Line 1: unlabelled code block found, papers must not contain code blocks",
    ]);
  });

  it("reports inline code", () => {
    expect(analyzeCodeBlocks("Use `x` here").issues).toEqual([
      "Line 1: inline code found, papers must not contain code",
    ]);
  });

  it("never counts a fence line as inline code", () => {
    expect(analyzeCodeBlocks("```js `x`").issues).toEqual([
      "Line 1: js `x` code block found, papers must not contain code blocks",
    ]);
  });

  it("still scans lines inside a block for inline code, after all fences", () => {
    expect(analyzeCodeBlocks("```\nuse `a`\n```\n```r\n```").issues).toEqual([
      "Line 1: unlabelled code block found, papers must not contain code blocks",
      "Line 4: r code block found, papers must not contain code blocks",
      "Line 2: inline code found, papers must not contain code",
    ]);
  });

  it("ignores a single backtick", () => {
    expect(analyzeCodeBlocks("it`s fine")).toEqual({ hasIssues: false, issues: [] });
  });
});
