import type { Finding, VerificationReport } from "./Finding.types";
import { countFailedChecks } from "./VerificationEngine";

/**
 * Markdown rendering of a verification report. Not part of the engine:
 * it consumes the structured result and never inspects documents itself.
 */

const TITLE = "# Paper Verification Report";

/** Heading, status line, issue bullets and metric lines, separated by blank lines */
function section(title: string, finding: Finding, metrics: string[] = []): string {
  const blocks = [`## ${title}`];
  if (finding.hasIssues) {
    blocks.push("**Status**: ❌ Issues found", finding.issues.map(issue => `- ${issue}`).join("\n"));
  } else {
    blocks.push("**Status**: ✅ Passed");
  }
  blocks.push(...metrics);
  return `${blocks.join("\n\n")}\n`;
}

export function renderErrorReport(error: string): string {
  return `${TITLE}\n\n**Error**: ${error}\n`;
}

export function renderMarkdownReport(report: VerificationReport): string {
  const { results } = report;
  const { sparseContent: sparse, stereotypeContent: stereotype, citations, images } = results;

  const sections = [
    section("1. Listing / Sparsity Check", sparse, [
      ...(sparse.hasIssues ? [`**Sparsity score**: ${sparse.sparsityScore.toFixed(2)}`] : []),
      `**Paragraphs**: ${sparse.paragraphCount}`,
    ]),
    section(
      "2. Stereotyped Expression Check",
      stereotype,
      stereotype.hasIssues
        ? [`**Affected paragraphs**: ${stereotype.affectedParagraphs}/${stereotype.totalParagraphs}`]
        : []
    ),
    section("3. LaTeX Formula Check", results.latexFormulas),
    section("4. Citation Check", citations, [
      `**Citations**: ${citations.citationsFound} (unique: ${citations.uniqueCitations})`,
    ]),
    section("5. Image Link Check", images, [`**Images**: ${images.imagesFound}`]),
    section("6. Code Block Check", results.codeBlocks),
  ];

  const bib = results.bibReferences;
  if (bib) {
    sections.push(section("7. Bibliography Verification", bib, [`**Verified**: ${bib.verifiedCount}/${bib.totalCount}`]));
  }

  const failed = countFailedChecks(results);
  const summary =
    failed > 0
      ? `**Overall status**: ❌ Found ${failed} categories of issues\n\n**Recommendation**: fix the issues above one by one.\n`
      : "**Overall status**: ✅ All checks passed\n\n**Conclusion**: the paper meets the format and content requirements.\n";

  const header =
    `${TITLE}\n\n` +
    `**Document**: ${report.documentPath}\n\n` +
    `**Bibliography**: ${report.bibliographyPath ?? "not provided"}\n\n` +
    `**Verified at**: ${report.timestamp ?? "N/A"}\n\n---\n\n`;

  return `${header}${sections.join("\n")}\n---\n\n## Summary\n\n${summary}`;
}
