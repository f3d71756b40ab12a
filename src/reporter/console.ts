import { crossTabulate } from "../analyzers/classify";
import { AggregateReport, DuplicateReport } from "../analyzers/types";
import { displayName } from "../fetchers/repoIds";
import { Palette, severityColor } from "../palette";
import { Counter, Histogram, rankEntries } from "../util/counter";
import { displayTimestamp } from "../util/time";

export const BAR_WIDTH = 40;
const SECTION_WIDTH = 80;
const LABEL_WIDTH = 30;
const MAX_ERRORS_SHOWN = 10;

export type ConsoleOptions = {
  palette: Palette;
  topN: number;
  names?: Map<string, string>;
  now?: Date;
};

export function renderBar(value: number, total: number, width: number = BAR_WIDTH): string {
  const filled = total > 0 ? Math.min(width, Math.floor((value * width) / total)) : 0;
  return "█".repeat(filled) + "░".repeat(width - filled);
}

export function formatBarLine(
  palette: Palette,
  label: string,
  value: number,
  total: number,
  color: (text: string) => string = palette.green,
  width: number = BAR_WIDTH
): string {
  const pct = total > 0 ? (value / total) * 100 : 0;
  const bar = renderBar(value, total, width);
  return `${label.padEnd(LABEL_WIDTH)} │ ${color(bar)} │ ${palette.bold(String(value).padStart(6))} (${pct.toFixed(1).padStart(5)}%)`;
}

function center(text: string, width: number): string {
  if (text.length >= width) return text;
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(left) + text + " ".repeat(width - text.length - left);
}

function sectionHeader(palette: Palette, title: string): string[] {
  const rule = palette.bold.cyan("=".repeat(SECTION_WIDTH));
  return ["", rule, palette.bold.magenta(center(title, SECTION_WIDTH)), rule, ""];
}

function subsection(palette: Palette, title: string): string[] {
  return ["", palette.bold.blue(`▶ ${title}`), palette.cyan("─".repeat(SECTION_WIDTH - 2))];
}

function noData(palette: Palette): string[] {
  return [palette.yellow("⚠ No data")];
}

export function formatSummary(report: AggregateReport, options: ConsoleOptions): string[] {
  const { palette } = options;
  const { summary, errors } = report;
  const lines = [
    "",
    palette.bold.magenta("=".repeat(SECTION_WIDTH)),
    palette.bold.magenta(center("Uncommented Function Analysis Summary", SECTION_WIDTH)),
    palette.bold.magenta("=".repeat(SECTION_WIDTH)),
    "",
    `${palette.cyan("Generated:")} ${displayTimestamp(options.now)}`,
    ...subsection(palette, "Overview"),
    "",
    `  Total projects:        ${palette.bold.cyan(String(summary.totalProjects))}`,
    `  Successful projects:   ${palette.bold.green(String(summary.successfulProjects))}`,
    `  Failed projects:       ${palette.bold.red(String(summary.failedProjects))}`,
    `  Uncommented functions: ${palette.bold.yellow(summary.totalFunctionCount.toLocaleString("en-US"))}`,
  ];

  if (summary.successfulProjects > 0) {
    const avg = summary.totalFunctionCount / summary.successfulProjects;
    lines.push(`  Average per project:   ${palette.bold.cyan(avg.toFixed(1))}`);
  }

  if (summary.totalProjects > 0) {
    const rate = (summary.successfulProjects / summary.totalProjects) * 100;
    const color = rate >= 90 ? palette.green : rate >= 70 ? palette.yellow : palette.red;
    lines.push("", `  Fetch success rate:    ${color.bold(`${rate.toFixed(1)}%`)}`);
  }

  if (errors.length > 0) {
    lines.push(...subsection(palette, `Failed projects (${errors.length})`), "");
    errors.slice(0, MAX_ERRORS_SHOWN).forEach((error, i) => {
      lines.push(`  ${palette.red("✗")} ${String(i + 1).padStart(2)}. ${error.projectId.slice(0, 50)}`);
      lines.push(`       ${palette.yellow(`Reason: ${error.error}`)}`);
    });
    if (errors.length > MAX_ERRORS_SHOWN) {
      lines.push("", `  ${palette.cyan(`... ${errors.length - MAX_ERRORS_SHOWN} more failed projects`)}`);
    }
  }

  return lines;
}

export function formatSeverity(report: AggregateReport, options: ConsoleOptions): string[] {
  const { palette } = options;
  const lines = sectionHeader(palette, "Severity Distribution");
  const entries = report.bySeverity;
  const total = entries.reduce((sum, [, count]) => sum + count, 0);
  if (total === 0) return [...lines, ...noData(palette)];

  for (const [severity, count] of rankEntries(entries)) {
    lines.push(formatBarLine(palette, severity, count, total, severityColor(palette, severity)));
  }
  lines.push("", palette.bold(`Total: ${total.toLocaleString("en-US")} uncommented functions`));
  return lines;
}

function formatRanked(
  title: string,
  histogram: Histogram,
  countLabel: string,
  color: (text: string) => string,
  options: ConsoleOptions
): string[] {
  const { palette, topN } = options;
  const lines = sectionHeader(palette, `${title} (Top ${topN})`);
  const entries = histogram;
  const total = entries.reduce((sum, [, count]) => sum + count, 0);
  if (total === 0) return [...lines, ...noData(palette)];

  rankEntries(entries, topN).forEach(([key, count], i) => {
    const label = `${String(i + 1).padStart(2)}. ${key.slice(0, 25)}`;
    lines.push(formatBarLine(palette, label, count, total, color));
  });

  lines.push(
    "",
    palette.bold("Statistics:"),
    `  • Distinct ${countLabel}: ${palette.cyan(String(entries.length))}`,
    `  • Functions: ${palette.cyan(total.toLocaleString("en-US"))}`
  );
  return lines;
}

export function formatTypes(report: AggregateReport, options: ConsoleOptions): string[] {
  return formatRanked("Function Type Distribution", report.byType, "types", options.palette.blue, options);
}

export function formatRules(report: AggregateReport, options: ConsoleOptions): string[] {
  return formatRanked("Rule / Author Distribution", report.byRule, "rules", options.palette.cyan, options);
}

export function formatProjectRanking(report: AggregateReport, options: ConsoleOptions): string[] {
  const { palette, topN } = options;
  const names = options.names ?? new Map<string, string>();
  const lines = sectionHeader(palette, "Project Ranking");
  const counter = Counter.fromEntries(report.byProject);
  if (counter.size === 0) return [...lines, palette.yellow("⚠ No project data")];

  const header = `${"Rank".padEnd(6)} ${"Project".padEnd(45)} ${"Functions".padStart(12)}`;

  lines.push(...subsection(palette, `Most uncommented functions (Top ${topN})`), "", header);
  counter.mostCommon(topN).forEach(([projectId, count], i) => {
    const rank = i + 1;
    const marker = rank <= 3 ? palette.red("!!") : rank <= 10 ? palette.yellow("! ") : "  ";
    lines.push(`${marker} ${String(rank).padStart(2)}.  ${displayName(projectId, names).padEnd(45)} ${palette.red(count.toLocaleString("en-US").padStart(8))}`);
  });

  lines.push(...subsection(palette, "Fewest uncommented functions (Top 10)"), "", header);
  counter.leastCommon(10).forEach(([projectId, count], i) => {
    lines.push(`${palette.green("✓")}  ${String(i + 1).padStart(2)}.  ${displayName(projectId, names).padEnd(45)} ${palette.green(count.toLocaleString("en-US").padStart(8))}`);
  });

  const average = counter.total() / counter.size;
  lines.push(
    "",
    palette.bold("Summary:"),
    `  • Projects with findings: ${palette.cyan(String(counter.size))}`,
    `  • Average per project: ${palette.cyan(average.toFixed(1))}`
  );
  return lines;
}

export function formatCrossDimension(report: AggregateReport, options: ConsoleOptions): string[] {
  const { palette } = options;
  const lines = sectionHeader(palette, "Cross-Dimension Analysis");
  if (report.allRecords.length === 0) return [...lines, ...noData(palette)];

  lines.push(...subsection(palette, "Top 5 function types per severity"));
  const table = crossTabulate(report.allRecords);
  for (const severity of [...table.keys()].sort()) {
    const types = table.get(severity) ?? new Counter();
    lines.push("", severityColor(palette, severity)(palette.bold(severity.toUpperCase())));
    types.mostCommon(5).forEach(([type, count], i) => {
      lines.push(`  ${i + 1}. ${type}: ${palette.bold(String(count))}`);
    });
  }
  return lines;
}

/** Full console analysis of a classified run. */
export function formatAnalysisReport(report: AggregateReport, options: ConsoleOptions): string {
  return [
    ...formatSummary(report, options),
    ...formatSeverity(report, options),
    ...formatTypes(report, options),
    ...formatRules(report, options),
    ...formatProjectRanking(report, options),
    ...formatCrossDimension(report, options),
  ].join("\n");
}

export function formatDuplicateReport(report: DuplicateReport, options: ConsoleOptions): string {
  const { palette } = options;
  const names = options.names ?? new Map<string, string>();
  const lines = [
    "",
    "=".repeat(SECTION_WIDTH),
    center("Duplicate Function Report", SECTION_WIDTH),
    center(`Generated: ${displayTimestamp(options.now)}`, SECTION_WIDTH),
    "=".repeat(SECTION_WIDTH),
    "",
    palette.bold("Overview"),
    "-".repeat(SECTION_WIDTH),
    `  Projects analyzed:       ${report.totalProjects}`,
    `  Projects with duplicates:${String(report.projectsWithDuplicates).padStart(2)}`,
    `  Duplicate groups:        ${report.totalGroups}`,
    `  Duplicate functions:     ${report.totalFunctions}`,
    `  Files affected:          ${report.totalFilesAffected}`,
    `  Authors involved:        ${report.totalAuthors}`,
  ];

  const languages = rankEntries(report.byLanguage);
  if (languages.length > 0) {
    lines.push("", palette.bold("Languages"), "-".repeat(SECTION_WIDTH));
    for (const [language, count] of languages) {
      lines.push(`  ${language.padEnd(15)} ${String(count).padStart(4)} ${"█".repeat(Math.min(50, count))}`);
    }
  }

  const complexity = [...report.byComplexity].sort((a, b) => a[0].localeCompare(b[0]));
  if (complexity.length > 0) {
    lines.push("", palette.bold("Complexity"), "-".repeat(SECTION_WIDTH));
    for (const [bucket, count] of complexity) {
      lines.push(`  ${bucket.padEnd(15)} ${String(count).padStart(4)} ${"█".repeat(Math.min(50, count * 5))}`);
    }
  }

  if (report.topGroups.length > 0) {
    lines.push("", palette.bold(`Top ${Math.min(10, report.topGroups.length)} duplicate groups`), "-".repeat(110));
    lines.push(`${"Rank".padEnd(6)} ${"Project".padEnd(45)} ${"Function".padEnd(30)} ${"Copies".padEnd(8)} ${"Files".padEnd(8)} ${"Complexity".padEnd(10)}`);
    report.topGroups.slice(0, 10).forEach((group, i) => {
      lines.push(
        `${String(i + 1).padEnd(6)} ${truncate(displayName(group.projectId, names), 43).padEnd(45)} ${truncate(group.groupName, 28).padEnd(30)} ` +
          `${String(group.numFunctions).padEnd(8)} ${String(group.numFiles).padEnd(8)} ${String(group.maxComplexity).padEnd(10)}`
      );
    });
  }

  return lines.join("\n");
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
