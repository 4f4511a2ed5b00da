import type { ActionResult, HandlerCallback, Memory } from "@elizaos/core";
import { PaperVerificationValidationError, errorMessage } from "../errors";
import { loadTextFile } from "../integration/manuscriptFiles";
import { logger } from "../utils/logger";

// ---------------------------------------------------------------------------
// Argument readers (message.content carries structured tool arguments)
// ---------------------------------------------------------------------------

export function messageText(message: Memory): string {
  return message.content.text ?? "";
}

export function stringArg(message: Memory, key: string): string | undefined {
  const value = message.content[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function booleanArg(message: Memory, key: string): boolean | undefined {
  const value = message.content[key];
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

/** First whitespace-delimited token in free text ending with the extension, e.g. "/tmp/paper.md". */
export function extractFilePath(text: string, extension: ".md" | ".bib"): string | undefined {
  const ext = extension.replace(".", "\\.");
  const match = new RegExp(`([^\\s"'\`]+${ext})(?=$|[\\s"'\`,;:)]|\\.(?:\\s|$))`, "i").exec(text);
  return match?.[1];
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export async function respond(
  callback: HandlerCallback | undefined,
  action: string,
  result: ActionResult
): Promise<ActionResult> {
  if (callback) await callback({ text: result.text ?? "", action });
  return result;
}

export function errorResult(error: string, extra: Record<string, unknown> = {}): ActionResult {
  return {
    success: false,
    text: error,
    data: { status: "error", error, ...extra },
  };
}

export function missingParamResult(paramName: string): ActionResult {
  const err = PaperVerificationValidationError.missingParam(paramName);
  return errorResult(err.toUserMessage(), { field: paramName });
}

/**
 * Load the manuscript named by `mdFilePath` (argument or message text) and run one analyzer over it.
 */
export async function runDocumentCheck<T extends { hasIssues: boolean; issues: string[] }>(
  action: string,
  message: Memory,
  callback: HandlerCallback | undefined,
  analyze: (text: string) => T,
  describe: (finding: T) => string
): Promise<ActionResult> {
  const mdFilePath = stringArg(message, "mdFilePath") ?? extractFilePath(messageText(message), ".md");
  if (!mdFilePath) return respond(callback, action, missingParamResult("mdFilePath"));

  const opLogger = logger.child({ operation: action, mdFilePath });
  try {
    const loaded = await loadTextFile(mdFilePath);
    if (!loaded.success) {
      return respond(callback, action, errorResult(loaded.error, { mdFilePath }));
    }

    const result = analyze(loaded.content);
    opLogger.info("Check complete", { issues: result.issues.length });
    return respond(callback, action, {
      success: true,
      text: describe(result),
      data: { status: "success", mdFilePath, result },
    });
  } catch (err) {
    opLogger.error("Check failed", {}, err);
    return respond(callback, action, errorResult(errorMessage(err), { mdFilePath }));
  }
}

export function describeIssues(title: string, finding: { hasIssues: boolean; issues: string[] }): string {
  if (!finding.hasIssues) return `${title}: passed.`;
  return `${title}: ${finding.issues.length} issue(s)\n${finding.issues.map(i => `- ${i}`).join("\n")}`;
}
