import { describe, it, expect, vi, afterEach } from "vitest";
import type { IAgentRuntime } from "@elizaos/core";
import { getMinReferences, getSerperApiKey, parsePositiveInt } from "../src/config/settings";
import { createMockRuntime } from "./setup";

function runtimeWith(settings: Record<string, string | undefined> = {}): IAgentRuntime {
  return createMockRuntime(settings) as unknown as IAgentRuntime;
}

describe("settings", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("getSerperApiKey", () => {
    it("prefers an explicit override", () => {
      expect(getSerperApiKey(runtimeWith({ SERPER_API_KEY: "test-key" }), " other-key ")).toBe("other-key");
    });

    it("reads the runtime setting, trimmed", () => {
      vi.stubEnv("SERPER_API_KEY", "env-key");
      expect(getSerperApiKey(runtimeWith({ SERPER_API_KEY: " test-key " }))).toBe("test-key");
    });

    it("falls back to the environment", () => {
      vi.stubEnv("SERPER_API_KEY", "env-key");
      expect(getSerperApiKey(runtimeWith())).toBe("env-key");
      expect(getSerperApiKey(undefined)).toBe("env-key");
    });

    it("treats blank values as absent", () => {
      vi.stubEnv("SERPER_API_KEY", "  ");
      expect(getSerperApiKey(runtimeWith({ SERPER_API_KEY: "" }), "")).toBeUndefined();
    });
  });

  describe("getMinReferences", () => {
    it("defaults to 15", () => {
      vi.stubEnv("PAPER_VERIFICATION_MIN_REFERENCES", "");
      expect(getMinReferences(runtimeWith())).toBe(15);
    });

    it("uses the runtime setting, then the override", () => {
      const runtime = runtimeWith({ PAPER_VERIFICATION_MIN_REFERENCES: "20" });
      expect(getMinReferences(runtime)).toBe(20);
      expect(getMinReferences(runtime, 5)).toBe(5);
      expect(getMinReferences(runtime, "7")).toBe(7);
    });

    it("ignores invalid overrides", () => {
      const runtime = runtimeWith({ PAPER_VERIFICATION_MIN_REFERENCES: "20" });
      expect(getMinReferences(runtime, "abc")).toBe(20);
      expect(getMinReferences(runtime, 0)).toBe(20);
    });
  });

  it("parses positive integers only", () => {
    expect(parsePositiveInt(3)).toBe(3);
    expect(parsePositiveInt(" 07 ")).toBe(7);
    expect(parsePositiveInt("0")).toBeUndefined();
    expect(parsePositiveInt(-1)).toBeUndefined();
    expect(parsePositiveInt(2.5)).toBeUndefined();
    expect(parsePositiveInt("x")).toBeUndefined();
    expect(parsePositiveInt(null)).toBeUndefined();
  });
});
