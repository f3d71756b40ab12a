import { describe, expect, it } from "vitest";
import { complexityBucket, summarizeDuplicates, toDuplicateGroup } from "../src/analyzers/duplicates";
import { FetchResult } from "../src/analyzers/types";

const at = "2025-01-10T07:30:00.000Z";

const results: FetchResult[] = [
  {
    ok: true,
    projectId: "A",
    timestamp: at,
    payload: {
      total: 2,
      data: [
        {
          groupName: "parseDate",
          numFunctions: 4,
          numFiles: 3,
          maxComplexity: 2,
          avgLines: 12.5,
          language: "TypeScript",
          filePaths: ["a.ts", "b.ts"],
          emails: ["dev1@example.com"],
        },
        {
          groupName: "fmt",
          numFunctions: 6,
          numFiles: 2,
          maxComplexity: 9,
          avgLines: 30,
          language: "Go",
          filePaths: ["c.go"],
          emails: ["dev1@example.com", "dev2@example.com"],
        },
      ],
    },
  },
  { ok: true, projectId: "B", timestamp: at, payload: { total: 0, data: [] } },
  { ok: false, projectId: "C", timestamp: at, error: "HTTP 502" },
];

describe("complexityBucket", () => {
  it("splits at 3 and 7", () => {
    expect(complexityBucket(1)).toBe("low (1-3)");
    expect(complexityBucket(3)).toBe("low (1-3)");
    expect(complexityBucket(4)).toBe("medium (4-7)");
    expect(complexityBucket(7)).toBe("medium (4-7)");
    expect(complexityBucket(8)).toBe("high (8+)");
  });
});

describe("toDuplicateGroup", () => {
  it("fills defaults for missing fields", () => {
    expect(toDuplicateGroup({}, "P")).toEqual({
      groupName: "Unknown",
      numFunctions: 0,
      numFiles: 0,
      maxComplexity: 0,
      avgLines: 0,
      language: "Unknown",
      filePaths: [],
      emails: [],
      projectId: "P",
    });
  });
});

describe("summarizeDuplicates", () => {
  it("aggregates groups across projects", () => {
    const report = summarizeDuplicates(results);

    expect(report).toMatchObject({
      totalProjects: 3,
      projectsWithDuplicates: 1,
      totalGroups: 2,
      totalFunctions: 10,
      totalFilesAffected: 5,
      totalAuthors: 2,
      byLanguage: [
        ["TypeScript", 4],
        ["Go", 6],
      ],
      byComplexity: [
        ["low (1-3)", 1],
        ["high (8+)", 1],
      ],
      projects: [{ projectId: "A", totalGroups: 2, totalFunctions: 10, totalFiles: 5 }],
      errors: [{ projectId: "C", error: "HTTP 502" }],
    });
    expect(report.topGroups.map((g) => g.groupName)).toEqual(["fmt", "parseDate"]);
    expect(report.topGroups[0]?.projectId).toBe("A");
  });

  it("caps the top list at twenty groups", () => {
    const many = Array.from({ length: 25 }, (_, i) => ({ groupName: `g${i}`, numFunctions: i }));
    const report = summarizeDuplicates([{ ok: true, projectId: "A", timestamp: at, payload: { total: 25, data: many } }]);

    expect(report.totalGroups).toBe(25);
    expect(report.topGroups).toHaveLength(20);
    expect(report.topGroups[0]?.groupName).toBe("g24");
    expect(report.topGroups[19]?.groupName).toBe("g5");
  });
});
