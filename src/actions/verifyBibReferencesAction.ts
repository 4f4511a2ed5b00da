import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { getSerperApiKey } from "../config/settings";
import { errorMessage } from "../errors";
import { loadBibliography } from "../integration/manuscriptFiles";
import { analyzeBibliography } from "../services/BibliographyAnalyzer";
import { SerperSearchClient } from "../services/SerperSearchService";
import { logger } from "../utils/logger";
import {
  describeIssues,
  errorResult,
  extractFilePath,
  messageText,
  missingParamResult,
  respond,
  stringArg,
} from "./actionSupport";

const ACTION = "VERIFY_BIB_REFERENCES";

export const VerifyBibReferencesAction: Action = {
  name: ACTION,
  description:
    "Check that every entry of a BibTeX file corresponds to a real publication by searching its " +
    "title and authors with the Serper API (requires SERPER_API_KEY).",
  similes: ["VERIFY_BIBLIOGRAPHY", "CHECK_REFERENCES", "CHECK_BIB_FILE"],
  parameters: {
    type: "object",
    properties: {
      bibFilePath: { type: "string", description: "Absolute path of the BibTeX bibliography" },
      serperApiKey: { type: "string", description: "Serper API key; defaults to the SERPER_API_KEY setting" },
    },
    required: ["bibFilePath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    if (typeof message.content.bibFilePath === "string") return true;
    return /\b(verify|check|validate)\b.*\b(bib|bibliography|references)\b/i.test(text) ||
      extractFilePath(text, ".bib") !== undefined;
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const bibFilePath = stringArg(message, "bibFilePath") ?? extractFilePath(messageText(message), ".bib");
    if (!bibFilePath) return respond(callback, ACTION, missingParamResult("bibFilePath"));

    const opLogger = logger.child({ operation: ACTION, bibFilePath });
    try {
      const client = new SerperSearchClient(getSerperApiKey(runtime, stringArg(message, "serperApiKey")));
      const result = await analyzeBibliography(await loadBibliography(bibFilePath), client);

      opLogger.info("Bibliography verification complete", {
        verified: result.verifiedCount,
        total: result.totalCount,
      });
      return respond(callback, ACTION, {
        success: true,
        text: `${describeIssues("Bibliography verification", result)}\nVerified: ${result.verifiedCount}/${result.totalCount}`,
        data: { status: "success", bibFilePath, result },
      });
    } catch (err) {
      opLogger.error("Bibliography verification failed", {}, err);
      return respond(callback, ACTION, errorResult(errorMessage(err), { bibFilePath }));
    }
  },
};
