import * as fs from "fs";
import * as path from "path";
import { NotFoundError } from "../errors";

export type ReportType = "all" | "uncommented" | "duplicate";

export type ReportFileInfo = {
  name: string;
  type: "uncommented" | "duplicate";
  size: string;
  createdAt: string;
  url: string;
};

export type StoredFile = {
  name: string;
  path: string;
  size: string;
  createdAt: string;
  mtimeMs: number;
};

const PATTERNS: Record<"uncommented" | "duplicate", RegExp> = {
  uncommented: /^uncommented_functions_report.*\.html$/,
  duplicate: /^duplicate_functions_report_.*\.html$/,
};

export function formatSize(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

/** Files in `dir` whose names pass `match`, newest first (name breaks ties). */
export function listFiles(dir: string, match: (name: string) => boolean): StoredFile[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter(match)
    .flatMap((name): StoredFile[] => {
      const filePath = path.join(dir, name);
      const stat = fs.statSync(filePath);
      if (!stat.isFile()) return [];
      return [
        {
          name,
          path: filePath,
          size: formatSize(stat.size),
          createdAt: stat.mtime.toISOString(),
          mtimeMs: stat.mtimeMs,
        },
      ];
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));
}

export function listReports(dir: string, type: ReportType = "all"): ReportFileInfo[] {
  return listFiles(dir, (name) => {
    if (name.includes("latest")) return false;
    if (type !== "duplicate" && PATTERNS.uncommented.test(name)) return true;
    return type !== "uncommented" && PATTERNS.duplicate.test(name);
  }).map((file) => ({
    name: file.name,
    type: PATTERNS.duplicate.test(file.name) ? "duplicate" : "uncommented",
    size: file.size,
    createdAt: file.createdAt,
    url: `/api/analysis/reports/${encodeURIComponent(file.name)}`,
  }));
}

/** Absolute path of a file directly inside `dir`; anything else is not found. */
export function resolveReportFile(dir: string, name: string): string {
  const root = path.resolve(dir);
  const target = path.resolve(root, name);
  if (path.dirname(target) !== root || name.includes("\0")) {
    throw new NotFoundError(`Report not found: ${name}`);
  }
  if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
    throw new NotFoundError(`Report not found: ${name}`);
  }
  return target;
}
