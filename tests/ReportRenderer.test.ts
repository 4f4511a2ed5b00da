import { describe, it, expect } from "vitest";
import { renderErrorReport, renderMarkdownReport } from "../src/services/ReportRenderer";
import type { VerificationReport, VerificationResults } from "../src/services/Finding.types";

function passingResults(): VerificationResults {
  return {
    sparseContent: { hasIssues: false, issues: [], sparsityScore: 0, paragraphCount: 3, medianLength: 400 },
    stereotypeContent: { hasIssues: false, issues: [], foundExpressions: [], affectedParagraphs: 0, totalParagraphs: 3 },
    latexFormulas: { hasIssues: false, issues: [] },
    citations: { hasIssues: false, issues: [], citationsFound: 2, uniqueCitations: 2 },
    images: { hasIssues: false, issues: [], imagesFound: 0 },
    codeBlocks: { hasIssues: false, issues: [] },
  };
}

describe("ReportRenderer", () => {
  it("renders a passing report", () => {
    const report: VerificationReport = {
      documentPath: "/p/paper.md",
      bibliographyPath: null,
      results: passingResults(),
      timestamp: "2026-01-01T00:00:00.000Z",
    };

    expect(renderMarkdownReport(report)).toBe(
      `# Paper Verification Report

**Document**: /p/paper.md

**Bibliography**: not provided

**Verified at**: 2026-01-01T00:00:00.000Z

---

## 1. Listing / Sparsity Check

**Status**: ✅ Passed

**Paragraphs**: 3

## 2. Stereotyped Expression Check

**Status**: ✅ Passed

## 3. LaTeX Formula Check

**Status**: ✅ Passed

## 4. Citation Check

**Status**: ✅ Passed

**Citations**: 2 (unique: 2)

## 5. Image Link Check

**Status**: ✅ Passed

**Images**: 0

## 6. Code Block Check

**Status**: ✅ Passed

---

## Summary

**Overall status**: ✅ All checks passed

**Conclusion**: the paper meets the format and content requirements.
`
    );
  });

  it("lists issues and metrics for failing checks", () => {
    const results = passingResults();
    results.sparseContent = { hasIssues: true, issues: ["a", "b"], sparsityScore: 0.5, paragraphCount: 10, medianLength: 100 };
    results.stereotypeContent = {
      hasIssues: true,
      issues: ["Stereotyped expressions found: 首先，"],
      foundExpressions: ["首先，"],
      affectedParagraphs: 1,
      totalParagraphs: 4,
    };
    results.bibReferences = {
      hasIssues: true,
      issues: ["Reference x may not exist: T"],
      verifiedCount: 1,
      totalCount: 2,
    };

    const markdown = renderMarkdownReport({ documentPath: "/p/paper.md", bibliographyPath: "/p/refs.bib", results });

    expect(markdown).toContain("**Bibliography**: /p/refs.bib\n");
    expect(markdown).toContain("**Verified at**: N/A\n");
    expect(markdown).toContain(
      "## 1. Listing / Sparsity Check\n\n**Status**: ❌ Issues found\n\n- a\n- b\n\n**Sparsity score**: 0.50\n\n**Paragraphs**: 10\n"
    );
    expect(markdown).toContain(
      "## 2. Stereotyped Expression Check\n\n**Status**: ❌ Issues found\n\n- Stereotyped expressions found: 首先，\n\n**Affected paragraphs**: 1/4\n"
    );
    expect(markdown).toContain(
      "## 7. Bibliography Verification\n\n**Status**: ❌ Issues found\n\n- Reference x may not exist: T\n\n**Verified**: 1/2\n"
    );
    expect(markdown).toContain("**Overall status**: ❌ Found 3 categories of issues\n");
  });

  it("renders a load failure", () => {
    expect(renderErrorReport("File does not exist: /p/missing.md")).toBe(
      "# Paper Verification Report\n\n**Error**: File does not exist: /p/missing.md\n"
    );
  });
});
