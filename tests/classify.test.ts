import { describe, expect, it } from "vitest";
import { classify, crossTabulate } from "../src/analyzers/classify";
import { decodeRecordList } from "../src/analyzers/decode";
import { FetchResult } from "../src/analyzers/types";

const at = "2025-01-10T07:30:00.000Z";

function ok(projectId: string, payload: unknown): FetchResult {
  return { ok: true, projectId, payload, timestamp: at };
}

function failed(projectId: string, error: string): FetchResult {
  return { ok: false, projectId, error, timestamp: at };
}

describe("decodeRecordList", () => {
  it("recognizes the three listing shapes", () => {
    expect(decodeRecordList({ data: [{ a: 1 }] })).toEqual({ kind: "flat", records: [{ a: 1 }] });
    expect(decodeRecordList({ data: { list: [{ a: 2 }] } })).toEqual({ kind: "nested", records: [{ a: 2 }] });
    expect(decodeRecordList({ list: [{ a: 3 }] })).toEqual({ kind: "list", records: [{ a: 3 }] });
  });

  it("falls back to an empty list for anything else", () => {
    expect(decodeRecordList(null)).toEqual({ kind: "unrecognized", records: [] });
    expect(decodeRecordList({ data: "nope" })).toEqual({ kind: "unrecognized", records: [] });
    expect(decodeRecordList({ data: null, list: [{ a: 1 }] })).toEqual({ kind: "unrecognized", records: [] });
  });

  it("drops entries that are not objects", () => {
    expect(decodeRecordList({ data: [{ a: 1 }, 2, "x", null, [3]] }).records).toEqual([{ a: 1 }]);
  });
});

describe("classify", () => {
  it("summarizes a mixed batch of successes and failures", () => {
    const report = classify([
      ok("A", { data: [{ severity: "high" }, { severity: "low" }] }),
      failed("B", "timeout"),
    ]);

    expect(report.summary).toEqual({
      totalProjects: 2,
      successfulProjects: 1,
      failedProjects: 1,
      totalFunctionCount: 2,
    });
    expect(report.bySeverity).toEqual([
      ["high", 1],
      ["low", 1],
    ]);
    expect(report.errors).toEqual([{ projectId: "B", error: "timeout" }]);
  });

  it("stamps each record with its project and keeps upstream fields", () => {
    const report = classify([ok("A", { data: { list: [{ name: "parse", severity: "medium", type: "method" }] } })]);

    expect(report.allRecords).toEqual([{ name: "parse", severity: "medium", type: "method", projectId: "A" }]);
  });

  it("tallies type, rule and project with unknown fallbacks", () => {
    const report = classify([
      ok("A", { data: [{ type: "function", rule: "doc-missing" }, { type: "function", ruleId: 42 }] }),
      ok("B", { list: [{ severity: 3 }] }),
    ]);

    expect(report.byType).toEqual([
      ["function", 2],
      ["unknown", 1],
    ]);
    expect(report.byRule).toEqual([
      ["doc-missing", 1],
      ["42", 1],
      ["unknown", 1],
    ]);
    expect(report.byProject).toEqual([
      ["A", 2],
      ["B", 1],
    ]);
    expect(report.bySeverity).toEqual([
      ["unknown", 2],
      ["3", 1],
    ]);
  });

  it("keeps integer-like keys in first-seen order", () => {
    const report = classify([ok("A", { data: [{ severity: "2" }, { severity: "1" }, { severity: 10 }] })]);

    expect(report.bySeverity.map(([key]) => key)).toEqual(["2", "1", "10"]);
  });

  it("keeps histogram totals equal to the record count", () => {
    const report = classify([
      ok("A", { data: [{ severity: "high" }, {}, { severity: "high" }] }),
      ok("B", { unexpected: true }),
      failed("C", "HTTP 500"),
    ]);

    const sum = (histogram: [string, number][]) => histogram.reduce((total, [, count]) => total + count, 0);
    expect(sum(report.bySeverity)).toBe(report.summary.totalFunctionCount);
    expect(sum(report.byType)).toBe(3);
    expect(report.summary.successfulProjects + report.summary.failedProjects).toBe(report.summary.totalProjects);
  });

  it("produces the same report for the same input", () => {
    const input = [ok("A", { data: [{ severity: "low", type: "x" }] }), failed("B", "boom")];
    expect(classify(input)).toEqual(classify(input));
  });

  it("handles an empty batch", () => {
    const report = classify([]);
    expect(report.summary).toEqual({ totalProjects: 0, successfulProjects: 0, failedProjects: 0, totalFunctionCount: 0 });
    expect(report.allRecords).toEqual([]);
  });
});

describe("crossTabulate", () => {
  it("counts types within each severity", () => {
    const { allRecords } = classify([
      ok("A", { data: [{ severity: "high", type: "method" }, { severity: "high", type: "method" }, { severity: "low", type: "arrow" }] }),
    ]);

    const table = crossTabulate(allRecords);

    expect([...table.keys()]).toEqual(["high", "low"]);
    expect(table.get("high")?.entries()).toEqual([["method", 2]]);
    expect(table.get("low")?.entries()).toEqual([["arrow", 1]]);
  });
});
