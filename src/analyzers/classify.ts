import { Counter } from "../util/counter";
import { decodeRecordList, tagValue } from "./decode";
import { AggregateReport, FetchResult, FunctionRecord, ProjectError } from "./types";

const UNKNOWN = "unknown";

/**
 * Single pass over fetch results: flattens every project's record list,
 * stamps each record with its project and tallies severity, type, rule and
 * project histograms. Failed fetches only contribute to the error list.
 */
export function classify(results: FetchResult[]): AggregateReport {
  const bySeverity = new Counter();
  const byType = new Counter();
  const byRule = new Counter();
  const byProject = new Counter();
  const allRecords: FunctionRecord[] = [];
  const errors: ProjectError[] = [];
  let successfulProjects = 0;

  for (const result of results) {
    if (!result.ok) {
      errors.push({ projectId: result.projectId, error: result.error });
      continue;
    }

    successfulProjects++;
    const { records } = decodeRecordList(result.payload);

    for (const record of records) {
      const stamped: FunctionRecord = { ...record, projectId: result.projectId };
      allRecords.push(stamped);

      bySeverity.increment(tagValue(record.severity) ?? UNKNOWN);
      byType.increment(tagValue(record.type) ?? UNKNOWN);
      byRule.increment(tagValue(record.rule) ?? tagValue(record.ruleId) ?? UNKNOWN);
      byProject.increment(result.projectId);
    }
  }

  return {
    summary: {
      totalProjects: results.length,
      successfulProjects,
      failedProjects: errors.length,
      totalFunctionCount: allRecords.length,
    },
    bySeverity: bySeverity.entries(),
    byType: byType.entries(),
    byRule: byRule.entries(),
    byProject: byProject.entries(),
    allRecords,
    errors,
  };
}

/** Severity → type counts, for the cross-dimension console section. */
export function crossTabulate(records: FunctionRecord[]): Map<string, Counter> {
  const table = new Map<string, Counter>();
  for (const record of records) {
    const severity = tagValue(record.severity) ?? UNKNOWN;
    let types = table.get(severity);
    if (!types) {
      types = new Counter();
      table.set(severity, types);
    }
    types.increment(tagValue(record.type) ?? UNKNOWN);
  }
  return table;
}
