import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { getMinReferences } from "../config/settings";
import { analyzeReferenceCount } from "../services/ReferenceCountAnalyzer";
import { describeIssues, messageText, runDocumentCheck } from "./actionSupport";

const ACTION = "VERIFY_REFERENCE_COUNT";

export const VerifyReferenceCountAction: Action = {
  name: ACTION,
  description:
    "Count the distinct [@key] citations in a Markdown paper and flag it when fewer than " +
    "minReferences (default 15) works are cited.",
  similes: ["COUNT_REFERENCES", "CHECK_REFERENCE_COUNT", "CITATION_COUNT"],
  parameters: {
    type: "object",
    properties: {
      mdFilePath: { type: "string", description: "Absolute path of the Markdown manuscript" },
      minReferences: {
        type: "number",
        description: "Minimum number of distinct works to cite (default 15)",
      },
    },
    required: ["mdFilePath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    return /\b(reference|citation)s?\s+count\b/i.test(text) || /\bhow many\s+(references|citations)\b/i.test(text);
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const minReferences = getMinReferences(runtime, message.content.minReferences);
    return runDocumentCheck(
      ACTION,
      message,
      callback,
      text => analyzeReferenceCount(text, minReferences),
      finding =>
        `${describeIssues("Reference count check", finding)}\nUnique references: ${finding.uniqueCitations} (minimum ${finding.minReferences})`
    );
  },
};
