import type { Action, ActionResult, IAgentRuntime, Memory, State, HandlerCallback, HandlerOptions } from "@elizaos/core";
import { getSerperApiKey } from "../config/settings";
import { errorMessage } from "../errors";
import { fileExists, loadBibliography, loadTextFile } from "../integration/manuscriptFiles";
import { renderMarkdownReport } from "../services/ReportRenderer";
import { countFailedChecks, summarizeResults, verifyPaper } from "../services/VerificationEngine";
import { logger } from "../utils/logger";
import {
  booleanArg,
  errorResult,
  extractFilePath,
  messageText,
  missingParamResult,
  respond,
  stringArg,
} from "./actionSupport";

const ACTION = "VERIFY_PAPER";

const VALIDATE_RE = /\b(verify|check|review|validate|audit)\b.*\b(paper|manuscript|thesis|article)\b/i;

export const VerifyPaperAction: Action = {
  name: ACTION,
  description:
    "Run every manuscript check over a Markdown paper: sparsity, stereotyped phrasing, bare math, " +
    "citation markers, image paths and code blocks. With a .bib file, also cross-checks citation keys " +
    "and looks up each reference with the Serper search API. Returns a structured result and a Markdown report.",
  similes: ["VERIFY_MANUSCRIPT", "CHECK_PAPER", "REVIEW_PAPER", "PAPER_VERIFICATION", "AUDIT_PAPER"],
  parameters: {
    type: "object",
    properties: {
      mdFilePath: { type: "string", description: "Absolute path of the Markdown manuscript" },
      bibFilePath: { type: "string", description: "Absolute path of the BibTeX bibliography" },
      serperApiKey: { type: "string", description: "Serper API key; defaults to the SERPER_API_KEY setting" },
      generateMarkdownReport: {
        type: "boolean",
        description: "Render the Markdown report (default true)",
      },
    },
    required: ["mdFilePath"],
  },
  examples: [
    [
      {
        name: "{{name1}}",
        content: { text: "Please verify the paper at /home/me/thesis/draft.md with /home/me/thesis/refs.bib" },
      },
      {
        name: "{{name2}}",
        content: {
          text: "# Paper Verification Report\n\n**Document**: /home/me/thesis/draft.md\n...",
          actions: [ACTION],
        },
      },
    ],
  ],

  validate: async (_runtime: IAgentRuntime, message: Memory) => {
    const text = messageText(message);
    if (typeof message.content.mdFilePath === "string") return true;
    return VALIDATE_RE.test(text) || extractFilePath(text, ".md") !== undefined;
  },

  async handler(
    runtime: IAgentRuntime,
    message: Memory,
    _state: State | undefined,
    _options: HandlerOptions | undefined,
    callback: HandlerCallback | undefined
  ): Promise<ActionResult> {
    const text = messageText(message);
    const mdFilePath = stringArg(message, "mdFilePath") ?? extractFilePath(text, ".md");
    if (!mdFilePath) return respond(callback, ACTION, missingParamResult("mdFilePath"));

    const bibFilePath = stringArg(message, "bibFilePath") ?? extractFilePath(text, ".bib");
    const generateReport = booleanArg(message, "generateMarkdownReport") ?? true;
    const opLogger = logger.child({ operation: ACTION, mdFilePath });

    try {
      opLogger.info("Starting paper verification", { bibFilePath: bibFilePath ?? null });

      const document = await loadTextFile(mdFilePath);
      if (!document.success) {
        return respond(callback, ACTION, errorResult(document.error, { mdFilePath }));
      }

      const bibliography = bibFilePath ? await loadBibliography(bibFilePath) : undefined;
      const verified = await verifyPaper(
        {
          document: document.content,
          documentPath: mdFilePath,
          bibliography,
          serperApiKey: getSerperApiKey(runtime, stringArg(message, "serperApiKey")),
        },
        { fileExists }
      );
      const report = { ...verified, timestamp: new Date().toISOString() };

      const totalIssuesFound = countFailedChecks(report.results);
      const markdownReport = generateReport ? renderMarkdownReport(report) : "";
      const responseText = generateReport
        ? markdownReport
        : `Verification complete: ${totalIssuesFound} categories of issues found.`;

      opLogger.info("Paper verification complete", { totalIssuesFound });
      return respond(callback, ACTION, {
        success: true,
        text: responseText,
        data: {
          status: "success",
          mdFilePath,
          bibFilePath: bibFilePath ?? null,
          totalIssuesFound,
          verificationSummary: {
            ...summarizeResults(report.results),
            bibReferences: report.results.bibReferences?.hasIssues ?? false,
          },
          detailedResults: report,
          markdownReport,
        },
      });
    } catch (err) {
      opLogger.error("Paper verification failed", {}, err);
      return respond(callback, ACTION, errorResult(`Verification failed: ${errorMessage(err)}`, { mdFilePath }));
    }
  },
};
