import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { analyzeStereotypes } from "../services/StereotypeAnalyzer";
import { describeIssues, messageText, runDocumentCheck } from "./actionSupport";

const ACTION = "VERIFY_STEREOTYPE_CONTENT";

export const VerifyStereotypeContentAction: Action = {
  name: ACTION,
  description:
    "Check only for boilerplate transitions (e.g. 首先，综上所述，) and stock bold-heading shapes in a Markdown paper.",
  similes: ["CHECK_STEREOTYPES", "CHECK_BOILERPLATE", "STEREOTYPE_CHECK"],
  parameters: {
    type: "object",
    properties: {
      mdFilePath: { type: "string", description: "Absolute path of the Markdown manuscript" },
    },
    required: ["mdFilePath"],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    return /\b(stereotyp\w*|boilerplate|clich\w*)\b/i.test(text) || text.includes("刻板");
  },

  async handler(
    _runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    return runDocumentCheck(ACTION, message, callback, analyzeStereotypes, finding =>
      `${describeIssues("Stereotype check", finding)}\nAffected paragraphs: ${finding.affectedParagraphs}/${finding.totalParagraphs}`
    );
  },
};
