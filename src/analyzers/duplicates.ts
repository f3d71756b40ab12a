import { Counter } from "../util/counter";
import { decodeRecordList, isPlainObject, numberField, stringField, stringListField } from "./decode";
import { DuplicateGroup, DuplicateProjectSummary, DuplicateReport, FetchResult, ProjectError, UpstreamRecord } from "./types";

export const TOP_GROUPS = 20;

export function complexityBucket(maxComplexity: number): string {
  if (maxComplexity <= 3) return "low (1-3)";
  if (maxComplexity <= 7) return "medium (4-7)";
  return "high (8+)";
}

export function toDuplicateGroup(record: UpstreamRecord, projectId: string): DuplicateGroup {
  return {
    groupName: stringField(record, "groupName"),
    numFunctions: numberField(record, "numFunctions"),
    numFiles: numberField(record, "numFiles"),
    maxComplexity: numberField(record, "maxComplexity"),
    avgLines: numberField(record, "avgLines"),
    language: stringField(record, "language"),
    filePaths: stringListField(record, "filePaths"),
    emails: stringListField(record, "emails"),
    projectId,
  };
}

export function summarizeDuplicates(results: FetchResult[]): DuplicateReport {
  const byLanguage = new Counter();
  const byComplexity = new Counter();
  const authors = new Set<string>();
  const allGroups: DuplicateGroup[] = [];
  const projects: DuplicateProjectSummary[] = [];
  const errors: ProjectError[] = [];
  let projectsWithDuplicates = 0;
  let totalFunctions = 0;
  let totalFilesAffected = 0;

  for (const result of results) {
    if (!result.ok) {
      errors.push({ projectId: result.projectId, error: result.error });
      continue;
    }

    if (isPlainObject(result.payload) && numberField(result.payload, "total") > 0) {
      projectsWithDuplicates++;
    }

    const groups = decodeRecordList(result.payload).records.map((r) => toDuplicateGroup(r, result.projectId));
    if (groups.length === 0) continue;

    for (const group of groups) {
      allGroups.push(group);
      totalFunctions += group.numFunctions;
      totalFilesAffected += group.numFiles;
      group.emails.forEach((email) => authors.add(email));
      byLanguage.increment(group.language, group.numFunctions);
      byComplexity.increment(complexityBucket(group.maxComplexity));
    }

    projects.push({
      projectId: result.projectId,
      totalGroups: groups.length,
      totalFunctions: groups.reduce((sum, g) => sum + g.numFunctions, 0),
      totalFiles: groups.reduce((sum, g) => sum + g.numFiles, 0),
    });
  }

  const topGroups = [...allGroups].sort((a, b) => b.numFunctions - a.numFunctions).slice(0, TOP_GROUPS);

  return {
    totalProjects: results.length,
    projectsWithDuplicates,
    totalGroups: allGroups.length,
    totalFunctions,
    totalFilesAffected,
    totalAuthors: authors.size,
    byLanguage: byLanguage.entries(),
    byComplexity: byComplexity.entries(),
    topGroups,
    projects,
    errors,
  };
}
