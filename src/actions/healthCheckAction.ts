import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { getSerperApiKey } from "../config/settings";
import { messageText, respond } from "./actionSupport";

const ACTION = "PAPER_VERIFICATION_HEALTH";

export const HealthCheckAction: Action = {
  name: ACTION,
  description: "Report whether the paper verification service is running and whether SERPER_API_KEY is configured.",
  similes: ["PAPER_VERIFICATION_STATUS", "VERIFIER_HEALTH"],
  parameters: {
    type: "object",
    properties: {},
    required: [],
  },

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    return /\b(health|status)\b.*\b(verification|verifier|serper)\b/i.test(messageText(message));
  },

  async handler(
    runtime: IAgentRuntime,
    _message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const serperConfigured = getSerperApiKey(runtime) !== undefined;
    const text =
      "Paper verification service is running\n" +
      `Serper API key: ${serperConfigured ? "✅ configured" : "❌ not configured"}`;
    return respond(callback, ACTION, {
      success: true,
      text,
      data: { status: "ok", serperConfigured },
    });
  },
};
