import { describe, it, expect, vi } from "vitest";
import { analyzeBibliography } from "../src/services/BibliographyAnalyzer";
import type { LookupResult, ReferenceSearchClient } from "../src/services/SerperSearchService";

const BIB = `@article{a1, title = {Found paper}, author = {Ann}}
@article{a2, title = {Ghost paper}}
@article{a3, author = {Nobody}}
@article{a4, title = {Broken lookup}}
`;

function fakeClient() {
  return {
    lookup: vi.fn(async (title: string): Promise<LookupResult> => {
      if (title === "Found paper") return { success: true, found: true, results: [{ title }] };
      if (title === "Broken lookup") return { success: false, error: "API request failed with status 500" };
      return { success: true, found: false, results: [] };
    }),
  };
}

describe("BibliographyAnalyzer", () => {
  it("verifies every entry and isolates failures", async () => {
    const client = fakeClient();

    const result = await analyzeBibliography({ path: "/refs.bib", content: BIB }, client);

    expect(result).toEqual({
      hasIssues: true,
      issues: [
        "Reference a2 may not exist: Ghost paper",
        "Reference a3 is missing a title",
        "Reference a4 verification failed: API request failed with status 500",
      ],
      verifiedCount: 1,
      totalCount: 4,
    });
    expect(client.lookup.mock.calls).toEqual([
      ["Found paper", "Ann"],
      ["Ghost paper", ""],
      ["Broken lookup", ""],
    ]);
  });

  it("looks entries up one at a time", async () => {
    let active = 0;
    let maxActive = 0;
    const client: ReferenceSearchClient = {
      async lookup() {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setTimeout(resolve, 1));
        active--;
        return { success: true, found: true, results: [] };
      },
    };

    const result = await analyzeBibliography(
      { path: "/refs.bib", content: "@misc{a, title = {A}}\n@misc{b, title = {B}}\n@misc{c, title = {C}}" },
      client
    );

    expect(maxActive).toBe(1);
    expect(result.verifiedCount).toBe(3);
  });

  it("reports a missing file", async () => {
    const client = fakeClient();

    const result = await analyzeBibliography({ path: "/missing.bib", content: null }, client);

    expect(result).toEqual({
      hasIssues: true,
      issues: ["Bibliography file does not exist: /missing.bib"],
      verifiedCount: 0,
      totalCount: 0,
    });
    expect(client.lookup).not.toHaveBeenCalled();
  });

  it("passes an empty bibliography", async () => {
    const result = await analyzeBibliography({ path: "/refs.bib", content: "" }, fakeClient());
    expect(result).toEqual({ hasIssues: false, issues: [], verifiedCount: 0, totalCount: 0 });
  });
});
