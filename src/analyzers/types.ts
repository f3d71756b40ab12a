import type { Histogram } from "../util/counter";

export type ProjectId = string;

export type FetchResult =
  | { ok: true; projectId: ProjectId; payload: unknown; timestamp: string }
  | { ok: false; projectId: ProjectId; error: string; timestamp: string };

export type UpstreamRecord = Record<string, unknown>;

/** One flagged function, upstream fields plus the owning project. */
export type FunctionRecord = UpstreamRecord & { projectId: ProjectId };

export type ProjectError = {
  projectId: ProjectId;
  error: string;
};

export type AggregateSummary = {
  totalProjects: number;
  successfulProjects: number;
  failedProjects: number;
  totalFunctionCount: number;
};

export type AggregateReport = {
  summary: AggregateSummary;
  bySeverity: Histogram;
  byType: Histogram;
  byRule: Histogram;
  byProject: Histogram;
  allRecords: FunctionRecord[];
  errors: ProjectError[];
};

export type DuplicateGroup = {
  groupName: string;
  numFunctions: number;
  numFiles: number;
  maxComplexity: number;
  avgLines: number;
  language: string;
  filePaths: string[];
  emails: string[];
  projectId: ProjectId;
};

export type DuplicateProjectSummary = {
  projectId: ProjectId;
  totalGroups: number;
  totalFunctions: number;
  totalFiles: number;
};

export type DuplicateReport = {
  totalProjects: number;
  projectsWithDuplicates: number;
  totalGroups: number;
  totalFunctions: number;
  totalFilesAffected: number;
  totalAuthors: number;
  byLanguage: Histogram;
  byComplexity: Histogram;
  topGroups: DuplicateGroup[];
  projects: DuplicateProjectSummary[];
  errors: ProjectError[];
};

export type CommitRecord = {
  message: string;
  userName: string;
  commitTime: string;
  commitId: string;
};
