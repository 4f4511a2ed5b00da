/**
 * Paragraph segmentation shared by the analyzers. Computed per call, never stored.
 */

const HEADING_RE = /^#{1,6}\s+/;
const SECTION_SPLIT_RE = /\n\s*\n/;
const IMAGE_RE = /!\[([^\]]*)\]\([^)]+\)/g;

/**
 * Prose paragraphs: blank-line sections, further split at heading lines
 * (headings are dropped). Only paragraphs longer than `minChars` after trimming survive.
 */
export function splitProseParagraphs(text: string, minChars: number): string[] {
  const paragraphs: string[] = [];

  for (const section of text.trim().split(SECTION_SPLIT_RE)) {
    if (!section.trim()) continue;

    let current: string[] = [];
    const flush = () => {
      if (current.length > 0) {
        paragraphs.push(current.join("\n"));
        current = [];
      }
    };

    for (const rawLine of section.split("\n")) {
      const line = rawLine.trim();
      if (!line) {
        flush();
        continue;
      }
      if (HEADING_RE.test(line)) {
        flush();
        continue;
      }
      current.push(line);
    }
    flush();
  }

  return paragraphs
    .map(p => p.trim())
    .filter(p => charLength(p) > minChars);
}

/** Length in code points, so an emoji or a supplementary CJK character counts once */
export function charLength(text: string): number {
  return [...text].length;
}

/** Coarse blocks: split on "\n\n", trimmed, empties dropped. Headings are kept. */
export function splitBlocks(text: string): string[] {
  return text
    .split("\n\n")
    .map(p => p.trim())
    .filter(p => p.length > 0);
}

/** Remove `![alt](target)` spans so alt text and URLs never trigger other checks. */
export function stripImages(text: string): string {
  return text.replace(IMAGE_RE, "");
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** 0.7 -> "70.0%" */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
