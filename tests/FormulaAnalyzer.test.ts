import { describe, it, expect } from "vitest";
import { analyzeFormulas, GREEK_LETTERS, MATH_SYMBOLS } from "../src/services/FormulaAnalyzer";

describe("FormulaAnalyzer", () => {
  it("knows 48 Greek letters, lowercase first", () => {
    expect(GREEK_LETTERS).toHaveLength(48);
    expect(GREEK_LETTERS[0]).toBe("α");
    expect(GREEK_LETTERS[23]).toBe("ω");
    expect(GREEK_LETTERS[24]).toBe("Α");
    expect(GREEK_LETTERS[47]).toBe("Ω");
    expect(GREEK_LETTERS).not.toContain("ς");
  });

  it("knows twelve math symbols", () => {
    expect(MATH_SYMBOLS).toHaveLength(12);
  });

  it("flags each bare Greek letter with its line number", () => {
    const result = analyzeFormulas("第一行\n下面是一些α和β字符");

    expect(result.issues).toEqual([
      "Line 2: bare Greek letter 'α' found, use LaTeX notation",
      "Line 2: bare Greek letter 'β' found, use LaTeX notation",
    ]);
    expect(result.hasIssues).toBe(true);
  });

  it("skips any line containing a dollar sign", () => {
    expect(analyzeFormulas("$x$ 下面是一些α和β字符").issues).toEqual([]);
    expect(analyzeFormulas("The price is $5 and α").issues).toEqual([]);
  });

  it("reports one issue per letter per line, not per occurrence", () => {
    expect(analyzeFormulas("α α α").issues).toHaveLength(1);
  });

  it("flags bare math symbols", () => {
    expect(analyzeFormulas("总和 ∑ 与 ∞").issues).toEqual([
      "Line 1: bare math symbol '∑' found, use LaTeX notation",
      "Line 1: bare math symbol '∞' found, use LaTeX notation",
    ]);
  });

  it("reports at most one expression issue per line", () => {
    expect(analyzeFormulas("x = y and a_b and z^2").issues).toEqual([
      "Line 1: possible math expression found, wrap it in LaTeX delimiters",
    ]);
  });

  it("orders issues by pass, then by line", () => {
    expect(analyzeFormulas("x = 1\nα").issues).toEqual([
      "Line 2: bare Greek letter 'α' found, use LaTeX notation",
      "Line 1: possible math expression found, wrap it in LaTeX delimiters",
    ]);
  });

  it("ignores image alt text and targets", () => {
    expect(analyzeFormulas("![α diagram](/img/β_x.png)").issues).toEqual([]);
  });

  it("treats CJK characters as word characters for expression boundaries", () => {
    expect(analyzeFormulas("这是x = 1").issues).toEqual([]);
    expect(analyzeFormulas("值 x = 1").issues).toHaveLength(1);
  });

  it("passes plain prose", () => {
    expect(analyzeFormulas("We evaluate the method on three datasets.")).toEqual({ hasIssues: false, issues: [] });
  });
});
