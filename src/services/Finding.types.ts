/**
 * Structured analyzer results. Every finding is plain JSON.
 * `hasIssues` always equals `issues.length > 0`.
 */

export interface Finding {
  hasIssues: boolean;
  issues: string[];
}

export interface SparsityFinding extends Finding {
  sparsityScore: number;
  paragraphCount: number;
  medianLength: number;
}

export interface StereotypeFinding extends Finding {
  foundExpressions: string[];
  affectedParagraphs: number;
  totalParagraphs: number;
}

export type FormulaFinding = Finding;

export type CodeBlockFinding = Finding;

export interface CitationFinding extends Finding {
  citationsFound: number;
  uniqueCitations: number;
}

export interface ImageFinding extends Finding {
  imagesFound: number;
}

export interface BibliographyFinding extends Finding {
  verifiedCount: number;
  totalCount: number;
}

export interface ReferenceCountFinding extends Finding {
  citationsFound: number;
  uniqueCitations: number;
  minReferences: number;
}

export interface VerificationResults {
  sparseContent: SparsityFinding;
  stereotypeContent: StereotypeFinding;
  latexFormulas: FormulaFinding;
  citations: CitationFinding;
  images: ImageFinding;
  codeBlocks: CodeBlockFinding;
  bibReferences?: BibliographyFinding;
}

export type AnalyzerName = keyof VerificationResults;

export interface VerificationReport {
  documentPath: string;
  bibliographyPath: string | null;
  results: VerificationResults;
  /** Attached by the caller, never by the engine */
  timestamp?: string;
}
