/**
 * SerperSearchService: Corroborates references against Google results via serper.dev.
 *
 * One POST per lookup, never retried. Every failure (missing key, transport error,
 * non-200 status) is returned as `{ success: false, error }`; lookup() never throws.
 *
 * PURE service: the credential is passed in, never read from the environment.
 */

import { SERPER_DEFAULTS } from "../config/constants";
import { PaperVerificationNetworkError, errorMessage } from "../errors";
import { logger } from "../utils/logger";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** An organic result entry, kept verbatim */
export type SearchMatch = Record<string, unknown>;

export type LookupResult =
  | { success: true; found: boolean; results: SearchMatch[] }
  | { success: false; error: string };

export interface ReferenceSearchClient {
  lookup(title: string, authors?: string): Promise<LookupResult>;
}

export interface SerperClientOptions {
  endpoint?: string;
  resultLimit?: number;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `"<title>"` optionally followed by the author string */
export function buildReferenceQuery(title: string, authors?: string): string {
  const query = `"${title}"`;
  return authors ? `${query} ${authors}` : query;
}

function organicResults(data: unknown): SearchMatch[] {
  if (!isRecord(data) || !Array.isArray(data.organic)) return [];
  return data.organic.filter(isRecord);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class SerperSearchClient implements ReferenceSearchClient {
  private readonly endpoint: string;
  private readonly resultLimit: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string | undefined,
    options: SerperClientOptions = {}
  ) {
    this.endpoint = options.endpoint ?? SERPER_DEFAULTS.ENDPOINT;
    this.resultLimit = options.resultLimit ?? SERPER_DEFAULTS.RESULT_LIMIT;
    this.timeoutMs = options.timeoutMs ?? SERPER_DEFAULTS.TIMEOUT_MS;
  }

  get hasCredential(): boolean {
    return Boolean(this.apiKey);
  }

  async lookup(title: string, authors?: string): Promise<LookupResult> {
    const opLogger = logger.child({ operation: "serperLookup", title });

    if (!this.apiKey) {
      const err = PaperVerificationNetworkError.missingCredential(SERPER_DEFAULTS.API_KEY_SETTING, {
        operation: "serperLookup",
      });
      opLogger.debug("Lookup skipped", { code: err.code });
      return { success: false, error: err.message };
    }

    const q = buildReferenceQuery(title, authors);

    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "X-API-KEY": this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ q, num: this.resultLimit }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (cause) {
      const err = PaperVerificationNetworkError.requestFailed(
        this.endpoint,
        cause instanceof Error ? cause : new Error(errorMessage(cause)),
        { operation: "serperLookup" }
      );
      opLogger.warn("Serper request failed", { endpoint: this.endpoint }, err);
      return { success: false, error: err.message };
    }

    if (res.status !== 200) {
      const err = PaperVerificationNetworkError.httpStatus(this.endpoint, res.status, {
        operation: "serperLookup",
      });
      opLogger.warn("Serper API error", { status: res.status }, err);
      return { success: false, error: err.message };
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (cause) {
      const err = PaperVerificationNetworkError.invalidResponse(
        this.endpoint,
        cause instanceof Error ? cause : new Error(errorMessage(cause)),
        { operation: "serperLookup" }
      );
      opLogger.warn("Serper returned invalid JSON", {}, err);
      return { success: false, error: err.message };
    }

    const organic = organicResults(data);
    if (organic.length === 0) {
      opLogger.debug("No organic results");
      return { success: true, found: false, results: [] };
    }
    return { success: true, found: true, results: organic.slice(0, this.resultLimit) };
  }
}
