import { describe, it, expect } from "vitest";
import { analyzeCitations, extractCitationKeys } from "../src/services/CitationAnalyzer";
import { analyzeReferenceCount } from "../src/services/ReferenceCountAnalyzer";

const keys = (...k: string[]) => ({ keys: new Set(k) });

describe("CitationAnalyzer", () => {
  it("extracts keys in document order", () => {
    expect(extractCitationKeys("A [@smith2020] and [@doe2019], again [@smith2020].")).toEqual([
      "smith2020",
      "doe2019",
      "smith2020",
    ]);
  });

  it("flags a citation missing from the bibliography", () => {
    const result = analyzeCitations("Prior work [@nonexistent] shows this.", keys("example2023", "real2020"));

    expect(result).toEqual({
      hasIssues: true,
      issues: ["Citation [@nonexistent] does not exist in the bibliography"],
      citationsFound: 1,
      uniqueCitations: 1,
    });
  });

  it("passes when every key is defined", () => {
    const result = analyzeCitations("See [@real2020] and [@example2023].", keys("example2023", "real2020"));
    expect(result.hasIssues).toBe(false);
    expect(result.citationsFound).toBe(2);
  });

  it("checks nothing else when the document has no citations", () => {
    const result = analyzeCitations("See [note] and [1].", { error: "boom" });
    expect(result).toEqual({ hasIssues: false, issues: [], citationsFound: 0, uniqueCitations: 0 });
  });

  it("flags non-standard brackets but exempts numbers and links", () => {
    const result = analyzeCitations("As shown [@a], see [see note] and [12] and [http://example.org].");

    expect(result.issues).toEqual(["Non-standard citation format: [see note], use [@key]"]);
  });

  it("does not treat image alt text as a citation", () => {
    const result = analyzeCitations("Shown [@a] in ![figure one](/tmp/fig.png).");
    expect(result.hasIssues).toBe(false);
  });

  it("reports a bibliography read failure once", () => {
    const result = analyzeCitations("[@a] and [@b]", { error: "Unterminated entry starting at line 3" });
    expect(result.issues).toEqual(["Failed to read bibliography: Unterminated entry starting at line 3"]);
  });

  it("reports every occurrence of an unknown key", () => {
    const result = analyzeCitations("[@x] and again [@x]", keys());

    expect(result.issues).toEqual([
      "Citation [@x] does not exist in the bibliography",
      "Citation [@x] does not exist in the bibliography",
    ]);
    expect(result.citationsFound).toBe(2);
    expect(result.uniqueCitations).toBe(1);
  });

  it("skips the cross-check without a bibliography", () => {
    expect(analyzeCitations("[@anything]").hasIssues).toBe(false);
  });
});

describe("ReferenceCountAnalyzer", () => {
  it("flags too few unique references", () => {
    expect(analyzeReferenceCount("[@a] [@b] [@a]", 3)).toEqual({
      hasIssues: true,
      issues: ["Only 2 unique references cited, at least 3 recommended"],
      citationsFound: 3,
      uniqueCitations: 2,
      minReferences: 3,
    });
  });

  it("passes at the threshold", () => {
    expect(analyzeReferenceCount("[@a] [@b]", 2).hasIssues).toBe(false);
  });
});
