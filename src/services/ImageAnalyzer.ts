import path from "node:path";
import type { ImageFinding } from "./Finding.types";

/**
 * ImageAnalyzer: Every image must point at an existing local file by absolute path.
 * Each image yields at most one issue; the first failing check wins.
 */

export interface ImageAnalysisContext {
  /** Existence check supplied by the caller; the analyzer never touches disk itself */
  fileExists: (filePath: string) => boolean;
}

const IMAGE_RE = /!\[([^\]]*)\]\(([^)]+)\)/g;

export function analyzeImages(text: string, context: ImageAnalysisContext): ImageFinding {
  const images = Array.from(text.matchAll(IMAGE_RE), m => ({ alt: m[1], target: m[2] }));
  const issues: string[] = [];

  for (const { alt, target } of images) {
    if (target.startsWith("http://") || target.startsWith("https://")) {
      issues.push(`Image '${alt}' uses a network link, must use a local absolute path: ${target}`);
      continue;
    }
    if (!path.isAbsolute(target)) {
      issues.push(`Image '${alt}' uses a relative path, must use an absolute path: ${target}`);
      continue;
    }
    if (!context.fileExists(target)) {
      issues.push(`Image file does not exist: ${target}`);
    }
  }

  return { hasIssues: issues.length > 0, issues, imagesFound: images.length };
}
