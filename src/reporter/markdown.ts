import * as fs from "fs";
import * as path from "path";
import { AggregateReport } from "../analyzers/types";
import { rankEntries } from "../util/counter";
import { displayTimestamp } from "../util/time";

export const MARKDOWN_REPORT_NAME = "uncommented_report.md";

export function buildMarkdownReport(report: AggregateReport, now: Date = new Date()): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push("# Uncommented Function Report");
  lines.push("");
  lines.push(`Generated: ${displayTimestamp(now)}`);
  lines.push("");

  lines.push("## Overall Statistics");
  lines.push("");
  lines.push(`- Total projects: ${summary.totalProjects}`);
  lines.push(`- Successful projects: ${summary.successfulProjects}`);
  lines.push(`- Failed projects: ${summary.failedProjects}`);
  lines.push(`- Uncommented functions: ${summary.totalFunctionCount}`);
  lines.push("");

  lines.push("## By Severity");
  lines.push("");
  for (const [severity, count] of rankEntries(report.bySeverity)) {
    lines.push(`- ${severity}: ${count}`);
  }
  lines.push("");

  lines.push("## By Type (Top 10)");
  lines.push("");
  for (const [type, count] of rankEntries(report.byType, 10)) {
    lines.push(`- ${type}: ${count}`);
  }
  lines.push("");

  if (report.errors.length > 0) {
    lines.push("## Failed Projects");
    lines.push("");
    for (const error of report.errors) {
      lines.push(`- ${error.projectId}: ${error.error}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function writeMarkdownReport(report: AggregateReport, outputDir: string, now?: Date): string {
  const filePath = path.join(outputDir, MARKDOWN_REPORT_NAME);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, buildMarkdownReport(report, now), "utf-8");
  return filePath;
}
