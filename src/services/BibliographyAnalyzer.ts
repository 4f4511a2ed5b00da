import { errorMessage } from "../errors";
import { logger } from "../utils/logger";
import { parseBibtex } from "./BibtexParser";
import type { BibliographyFinding } from "./Finding.types";
import type { ReferenceSearchClient } from "./SerperSearchService";

/** Bibliography text as loaded by the caller; `content` is null when the file does not exist. */
export interface BibliographySource {
  path: string;
  content: string | null;
}

/**
 * Verify each bibliography entry against the search index, strictly one at a time.
 * A failing or unreadable entry never affects the others; each parse error becomes one issue.
 */
export async function analyzeBibliography(
  source: BibliographySource,
  client: ReferenceSearchClient
): Promise<BibliographyFinding> {
  if (source.content === null) {
    return {
      hasIssues: true,
      issues: [`Bibliography file does not exist: ${source.path}`],
      verifiedCount: 0,
      totalCount: 0,
    };
  }

  const opLogger = logger.child({ operation: "analyzeBibliography", path: source.path });
  const issues: string[] = [];
  let verifiedCount = 0;
  let totalCount = 0;

  try {
    const { entries, errors } = parseBibtex(source.content);

    for (const error of errors) {
      issues.push(`Failed to parse bibliography: ${error}`);
    }

    for (const entry of entries) {
      totalCount++;

      if (!entry.title) {
        issues.push(`Reference ${entry.key} is missing a title`);
        continue;
      }

      const result = await client.lookup(entry.title, entry.author);

      if (!result.success) {
        issues.push(`Reference ${entry.key} verification failed: ${result.error}`);
      } else if (!result.found) {
        issues.push(`Reference ${entry.key} may not exist: ${entry.title}`);
      } else {
        verifiedCount++;
      }
      opLogger.debug("Entry checked", { key: entry.key, success: result.success });
    }
  } catch (err) {
    opLogger.warn("Bibliography could not be parsed", {}, err);
    issues.push(`Failed to parse bibliography: ${errorMessage(err)}`);
  }

  return {
    hasIssues: issues.length > 0,
    issues,
    verifiedCount,
    totalCount,
  };
}
