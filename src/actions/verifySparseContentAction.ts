import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { analyzeSparsity } from "../services/SparsityAnalyzer";
import { describeIssues, messageText, runDocumentCheck } from "./actionSupport";

const ACTION = "VERIFY_SPARSE_CONTENT";

export const VerifySparseContentAction: Action = {
  name: ACTION,
  description:
    "Check only whether a Markdown paper is dominated by short or list-style paragraphs. " +
    "Returns a sparsity score, paragraph count and median paragraph length.",
  similes: ["CHECK_SPARSITY", "CHECK_LISTING", "SPARSE_CONTENT_CHECK"],
  parameters: {
    type: "object",
    properties: {
      mdFilePath: { type: "string", description: "Absolute path of the Markdown manuscript" },
    },
    required: ["mdFilePath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    return /\b(sparse|sparsity|listy|list-style)\b/i.test(text) || text.includes("罗列");
  },

  async handler(
    _runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    return runDocumentCheck(ACTION, message, callback, analyzeSparsity, finding =>
      `${describeIssues("Sparsity check", finding)}\nSparsity score: ${finding.sparsityScore.toFixed(2)}, paragraphs: ${finding.paragraphCount}`
    );
  },
};
