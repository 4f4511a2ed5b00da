/**
 * Centralized constants for the paper verification plugin.
 * Thresholds are part of each analyzer's observable behaviour; changing one is a behaviour change.
 */

export const SPARSITY_THRESHOLDS = {
  /** Paragraphs at or below this trimmed length are discarded */
  MIN_PARAGRAPH_CHARS: 20,
  SHORT_PARAGRAPH_CHARS: 300,
  VERY_SHORT_PARAGRAPH_CHARS: 100,
  SHORT_RATIO_LIMIT: 0.6,
  VERY_SHORT_RATIO_LIMIT: 0.4,
  LIST_RATIO_LIMIT: 0.3,
  SHORT_PENALTY: 0.3,
  VERY_SHORT_PENALTY: 0.2,
  LIST_PENALTY: 0.2,
  /** Score reported when no paragraph survives filtering */
  EMPTY_SCORE: 1.0,
} as const;

export const STEREOTYPE_DEFAULTS = {
  /** Max characters inside a bold span for it to count as a stock heading */
  MAX_BOLD_HEADING_CHARS: 15,
} as const;

export const SERPER_DEFAULTS = {
  ENDPOINT: "https://google.serper.dev/search",
  RESULT_LIMIT: 3,
  TIMEOUT_MS: 20_000,
  API_KEY_SETTING: "SERPER_API_KEY",
} as const;

export const REFERENCE_COUNT_DEFAULTS = {
  MIN_REFERENCES: 15,
  SETTING: "PAPER_VERIFICATION_MIN_REFERENCES",
} as const;
