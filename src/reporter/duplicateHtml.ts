import * as fs from "fs";
import * as path from "path";
import { DuplicateReport } from "../analyzers/types";
import { displayName } from "../fetchers/repoIds";
import { rankEntries } from "../util/counter";
import { displayTimestamp, fileTimestamp } from "../util/time";
import { BASE_STYLE, chartScript, escapeHtml, metaCards } from "./html";

const MAX_FILES_LISTED = 5;

export type DuplicateHtmlOptions = {
  names?: Map<string, string>;
  now?: Date;
};

export function writeDuplicateHtmlReport(report: DuplicateReport, outputDir: string, options: DuplicateHtmlOptions = {}): string {
  const filePath = path.join(outputDir, `duplicate_functions_report_${fileTimestamp(options.now)}.html`);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, buildDuplicateHtml(report, options), "utf-8");
  return filePath;
}

/** Short chart label: last path segment of a mapped name, without a trailing _src. */
export function chartLabel(projectId: string, names: Map<string, string>): string {
  const name = displayName(projectId, names);
  if (!name.includes("/")) return name;
  const last = name.split("/").pop() ?? name;
  return last.replace("_src", "");
}

function buildGroupRows(report: DuplicateReport, names: Map<string, string>): string {
  return report.topGroups
    .map((group, i) => {
      const shown = group.filePaths.slice(0, MAX_FILES_LISTED).map(escapeHtml);
      const hidden = group.filePaths.length - MAX_FILES_LISTED;
      if (hidden > 0) shown.push(`... ${hidden} more files`);

      return `
      <tr>
        <td>${i + 1}</td>
        <td title="${escapeHtml(group.projectId)}">${escapeHtml(displayName(group.projectId, names))}</td>
        <td class="mono">${escapeHtml(group.groupName)}</td>
        <td>${escapeHtml(group.language)}</td>
        <td>${group.numFunctions}</td>
        <td>${group.numFiles}</td>
        <td>${group.maxComplexity}</td>
        <td>${group.avgLines.toFixed(1)}</td>
        <td><small>${shown.join("<br>")}</small></td>
        <td><small>${group.emails.map(escapeHtml).join("<br>")}</small></td>
      </tr>`;
    })
    .join("");
}

export function buildDuplicateHtml(report: DuplicateReport, options: DuplicateHtmlOptions = {}): string {
  const names = options.names ?? new Map<string, string>();
  const languages = report.byLanguage;
  const complexity = report.byComplexity;
  const projects = rankEntries(
    report.projects.map((p): [string, number] => [p.projectId, p.totalFunctions]),
    10
  );

  const script = chartScript([
    {
      id: "languageChart",
      config: {
        type: "pie",
        data: {
          labels: languages.map(([key]) => key),
          datasets: [{ data: languages.map(([, n]) => n), backgroundColor: ["#667eea", "#764ba2", "#f093fb", "#4facfe", "#43e97b", "#fa709a"] }],
        },
        options: { plugins: { legend: { position: "bottom" } } },
      },
    },
    {
      id: "complexityChart",
      config: {
        type: "bar",
        data: {
          labels: complexity.map(([key]) => key),
          datasets: [{ label: "Groups", data: complexity.map(([, n]) => n), backgroundColor: "#667eea" }],
        },
        options: { plugins: { legend: { display: false } }, scales: { y: { beginAtZero: true } } },
      },
    },
    {
      id: "projectChart",
      config: {
        type: "bar",
        data: {
          labels: projects.map(([id]) => chartLabel(id, names)),
          datasets: [{ label: "Duplicate functions", data: projects.map(([, n]) => n), backgroundColor: "#764ba2" }],
        },
        options: { plugins: { legend: { display: false } }, scales: { y: { beginAtZero: true } } },
      },
    },
  ]);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8"/>
<meta name="viewport" content="width=device-width, initial-scale=1.0"/>
<title>Duplicate Function Report</title>
<style>${BASE_STYLE}</style>
</head>
<body>
<div class="container">
  <header class="header">
    <h1>Duplicate Function Report</h1>
    <p class="subtitle">Generated ${escapeHtml(displayTimestamp(options.now))}</p>
  </header>
${metaCards([
  { label: "Projects", value: String(report.totalProjects) },
  { label: "With duplicates", value: String(report.projectsWithDuplicates) },
  { label: "Groups", value: String(report.totalGroups) },
  { label: "Functions", value: String(report.totalFunctions) },
  { label: "Files affected", value: String(report.totalFilesAffected) },
  { label: "Authors", value: String(report.totalAuthors) },
])}
  <section>
    <h2>Distribution</h2>
    <div class="chart-grid">
      <div class="chart-card"><h3>Languages</h3><canvas id="languageChart"></canvas></div>
      <div class="chart-card"><h3>Complexity</h3><canvas id="complexityChart"></canvas></div>
      <div class="chart-card"><h3>Projects (Top 10)</h3><canvas id="projectChart"></canvas></div>
    </div>
  </section>
  <section>
    <h2>Top Duplicate Groups</h2>
    <table class="data-table">
      <thead><tr><th>#</th><th>Project</th><th>Function</th><th>Language</th><th>Copies</th><th>Files</th><th>Complexity</th><th>Avg lines</th><th>Paths</th><th>Authors</th></tr></thead>
      <tbody>${buildGroupRows(report, names)}</tbody>
    </table>
  </section>
<footer class="footer">Generated by quality-pulse</footer>
</div>
${script}
</body>
</html>`;
}
