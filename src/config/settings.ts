import type { IAgentRuntime } from "@elizaos/core";
import { REFERENCE_COUNT_DEFAULTS, SERPER_DEFAULTS } from "./constants";

/**
 * Settings are resolved from runtime settings first (per-agent configuration),
 * then from the process environment. The verification engine never calls these;
 * actions resolve values and pass them in.
 */

function readSetting(runtime: IAgentRuntime | undefined, key: string): string | undefined {
  const fromRuntime: unknown = runtime?.getSetting(key);
  if (typeof fromRuntime === "string" && fromRuntime.trim()) return fromRuntime.trim();
  if (typeof fromRuntime === "number") return String(fromRuntime);

  const fromEnv = process.env[key];
  if (fromEnv && fromEnv.trim()) return fromEnv.trim();
  return undefined;
}

/**
 * Resolve the Serper credential. An explicit override (e.g. an action argument) wins.
 */
export function getSerperApiKey(runtime: IAgentRuntime | undefined, override?: string): string | undefined {
  if (override && override.trim()) return override.trim();
  return readSetting(runtime, SERPER_DEFAULTS.API_KEY_SETTING);
}

export function parsePositiveInt(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const n = Number.parseInt(value.trim(), 10);
    return n > 0 ? n : undefined;
  }
  return undefined;
}

export function getMinReferences(runtime: IAgentRuntime | undefined, override?: unknown): number {
  return (
    parsePositiveInt(override) ??
    parsePositiveInt(readSetting(runtime, REFERENCE_COUNT_DEFAULTS.SETTING)) ??
    REFERENCE_COUNT_DEFAULTS.MIN_REFERENCES
  );
}
