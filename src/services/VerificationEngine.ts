/**
 * VerificationEngine: Runs every analyzer over one manuscript.
 *
 * Takes pre-loaded text and an explicit credential; performs no I/O of its own
 * apart from the search lookups of the bibliography check.
 */

import { errorMessage } from "../errors";
import { analyzeBibliography, type BibliographySource } from "./BibliographyAnalyzer";
import { bibliographyKeys, parseBibtex } from "./BibtexParser";
import { analyzeCitations, type BibliographyKeys } from "./CitationAnalyzer";
import { analyzeCodeBlocks } from "./CodeBlockAnalyzer";
import type { AnalyzerName, Finding, VerificationReport, VerificationResults } from "./Finding.types";
import { analyzeFormulas } from "./FormulaAnalyzer";
import { analyzeImages } from "./ImageAnalyzer";
import { SerperSearchClient, type ReferenceSearchClient } from "./SerperSearchService";
import { analyzeSparsity } from "./SparsityAnalyzer";
import { analyzeStereotypes } from "./StereotypeAnalyzer";

export interface VerificationInput {
  document: string;
  documentPath: string;
  bibliography?: BibliographySource;
  serperApiKey?: string;
}

export interface VerificationDeps {
  fileExists: (filePath: string) => boolean;
  /** Overrides the client built from `serperApiKey` */
  searchClient?: ReferenceSearchClient;
}

interface TextAnalysisContext {
  fileExists: (filePath: string) => boolean;
  bibliographyKeys?: BibliographyKeys;
}

type TextAnalyzerName = Exclude<AnalyzerName, "bibReferences">;

/** Report order is the key order of this table */
const TEXT_ANALYZERS: { [K in TextAnalyzerName]: (text: string, ctx: TextAnalysisContext) => VerificationResults[K] } = {
  sparseContent: text => analyzeSparsity(text),
  stereotypeContent: text => analyzeStereotypes(text),
  latexFormulas: text => analyzeFormulas(text),
  citations: (text, ctx) => analyzeCitations(text, ctx.bibliographyKeys),
  images: (text, ctx) => analyzeImages(text, ctx),
  codeBlocks: text => analyzeCodeBlocks(text),
};

export const ANALYZER_NAMES: readonly AnalyzerName[] = [
  "sparseContent",
  "stereotypeContent",
  "latexFormulas",
  "citations",
  "images",
  "codeBlocks",
  "bibReferences",
];

/**
 * Key set for the citation cross-check; undefined when the bibliography file is missing.
 * Entries the parser skipped are reported by the bibliography check, not here.
 */
function resolveBibliographyKeys(source: BibliographySource | undefined): BibliographyKeys | undefined {
  if (!source || source.content === null) return undefined;
  try {
    return { keys: bibliographyKeys(parseBibtex(source.content).entries) };
  } catch (err) {
    return { error: errorMessage(err) };
  }
}

export function runTextAnalyzers(text: string, ctx: TextAnalysisContext): Omit<VerificationResults, "bibReferences"> {
  return {
    sparseContent: TEXT_ANALYZERS.sparseContent(text, ctx),
    stereotypeContent: TEXT_ANALYZERS.stereotypeContent(text, ctx),
    latexFormulas: TEXT_ANALYZERS.latexFormulas(text, ctx),
    citations: TEXT_ANALYZERS.citations(text, ctx),
    images: TEXT_ANALYZERS.images(text, ctx),
    codeBlocks: TEXT_ANALYZERS.codeBlocks(text, ctx),
  };
}

export async function verifyPaper(input: VerificationInput, deps: VerificationDeps): Promise<VerificationReport> {
  const results: VerificationResults = runTextAnalyzers(input.document, {
    fileExists: deps.fileExists,
    bibliographyKeys: resolveBibliographyKeys(input.bibliography),
  });

  if (input.bibliography) {
    const client = deps.searchClient ?? new SerperSearchClient(input.serperApiKey);
    results.bibReferences = await analyzeBibliography(input.bibliography, client);
  }

  return {
    documentPath: input.documentPath,
    bibliographyPath: input.bibliography?.path ?? null,
    results,
  };
}

/** Pass/fail per analyzer that ran: true means issues were found. */
export function summarizeResults(results: VerificationResults): Partial<Record<AnalyzerName, boolean>> {
  const summary: Partial<Record<AnalyzerName, boolean>> = {};
  for (const name of ANALYZER_NAMES) {
    const finding: Finding | undefined = results[name];
    if (finding) summary[name] = finding.hasIssues;
  }
  return summary;
}

/** Number of analyzers reporting at least one issue. */
export function countFailedChecks(results: VerificationResults): number {
  return Object.values(summarizeResults(results)).filter(Boolean).length;
}
