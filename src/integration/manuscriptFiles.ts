import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { ErrorCode, PaperVerificationValidationError, wrapError } from "../errors";
import type { BibliographySource } from "../services/BibliographyAnalyzer";

/**
 * File-system collaborators for the actions. The engine itself never touches disk.
 */

export type LoadResult =
  | { success: true; path: string; content: string }
  | { success: false; path: string; error: string };

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/** Read a UTF-8 text file; a missing or unreadable file becomes `{ success: false }`. */
export async function loadTextFile(filePath: string): Promise<LoadResult> {
  if (!fileExists(filePath)) {
    const err = PaperVerificationValidationError.fileNotFound(filePath, { operation: "loadTextFile" });
    return { success: false, path: filePath, error: err.message };
  }
  try {
    const content = await readFile(filePath, "utf-8");
    return { success: true, path: filePath, content };
  } catch (cause) {
    const err = wrapError(cause, ErrorCode.STORAGE_READ_FAILED, { operation: "loadTextFile", filePath });
    return { success: false, path: filePath, error: `Failed to read file: ${err.message}` };
  }
}

/** A bibliography path that does not exist yields `content: null` rather than an error. */
export async function loadBibliography(filePath: string): Promise<BibliographySource> {
  const loaded = await loadTextFile(filePath);
  if (loaded.success) return { path: filePath, content: loaded.content };
  if (!fileExists(filePath)) return { path: filePath, content: null };
  throw new PaperVerificationValidationError(loaded.error, ErrorCode.STORAGE_READ_FAILED, {
    operation: "loadBibliography",
    filePath,
  });
}
