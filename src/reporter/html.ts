import * as fs from "fs";
import * as path from "path";
import { AggregateReport } from "../analyzers/types";
import { displayName } from "../fetchers/repoIds";
import { rankEntries } from "../util/counter";
import { displayTimestamp, fileTimestamp } from "../util/time";

export const CHART_JS_CDN = "https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js";

export type HtmlOptions = {
  names?: Map<string, string>;
  topN?: number;
  now?: Date;
};

export function writeHtmlReport(report: AggregateReport, outputDir: string, options: HtmlOptions = {}): string {
  const filePath = path.join(outputDir, `uncommented_functions_report_${fileTimestamp(options.now)}.html`);
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, buildHtml(report, options), "utf-8");
  return filePath;
}

// --- Helpers ---

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** JSON for embedding inside a <script> element. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}

export function metaCards(cards: { label: string; value: string }[]): string {
  const items = cards
    .map(
      (c) => `
    <div class="meta-card">
      <div class="meta-label">${escapeHtml(c.label)}</div>
      <div class="meta-value">${escapeHtml(c.value)}</div>
    </div>`
    )
    .join("");

  return `<section class="meta-row">${items}</section>`;
}

export function chartScript(charts: { id: string; config: unknown }[]): string {
  const body = charts
    .map((c) => `  new Chart(document.getElementById(${scriptJson(c.id)}), ${scriptJson(c.config)});`)
    .join("\n");
  return `<script src="${CHART_JS_CDN}"></script>
<script>
${body}
</script>`;
}

export const BASE_STYLE = `
  *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Helvetica, Arial, sans-serif;
    background: #0f172a; color: #e2e8f0; line-height: 1.6; padding: 2rem;
  }
  .container { max-width: 1100px; margin: 0 auto; }

  .header { margin-bottom: 2rem; }
  .header h1 { font-size: 1.8rem; color: #f8fafc; }
  .subtitle { color: #94a3b8; font-size: 1rem; }

  .meta-row { display: flex; gap: 1rem; flex-wrap: wrap; margin-bottom: 2rem; }
  .meta-card {
    background: #1e293b; border-radius: 8px; padding: 0.75rem 1rem; flex: 1 1 150px; min-width: 140px;
  }
  .meta-label { color: #64748b; font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.05em; }
  .meta-value { color: #e2e8f0; font-size: 1.1rem; word-break: break-all; }

  h2 { font-size: 1.25rem; color: #f1f5f9; margin-bottom: 1rem; margin-top: 2rem; border-bottom: 1px solid #334155; padding-bottom: 0.5rem; }

  .chart-grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(320px, 1fr)); gap: 1rem; }
  .chart-card { background: #1e293b; border-radius: 8px; padding: 1rem; }
  .chart-card h3 { font-size: 0.9rem; color: #94a3b8; margin-bottom: 0.5rem; }

  .data-table { width: 100%; border-collapse: collapse; font-size: 0.85rem; }
  .data-table th { text-align: left; color: #64748b; padding: 0.5rem; border-bottom: 1px solid #334155; }
  .data-table td { padding: 0.5rem; border-bottom: 1px solid #1e293b; vertical-align: top; }
  .mono { font-family: monospace; color: #818cf8; word-break: break-all; }
  .count-cell { text-align: right; width: 100px; }
  .error-list li { margin-bottom: 0.5rem; font-size: 0.9rem; }
  .error-reason { color: #eab308; }

  .footer { text-align: center; color: #475569; font-size: 0.75rem; margin-top: 3rem; padding-top: 1rem; border-top: 1px solid #1e293b; }
`;

const CHART_COLORS = ["#ef4444", "#eab308", "#22c55e", "#3b82f6", "#a855f7", "#06b6d4", "#f97316", "#64748b"];

// --- Section Builders ---

function buildCharts(report: AggregateReport, names: Map<string, string>): { markup: string; script: string } {
  const severity = rankEntries(report.bySeverity);
  const types = rankEntries(report.byType, 10);
  const projects = rankEntries(report.byProject, 10);

  const markup = `
  <section>
    <h2>Distribution</h2>
    <div class="chart-grid">
      <div class="chart-card"><h3>Severity</h3><canvas id="severityChart"></canvas></div>
      <div class="chart-card"><h3>Function types (Top 10)</h3><canvas id="typeChart"></canvas></div>
      <div class="chart-card"><h3>Projects (Top 10)</h3><canvas id="projectChart"></canvas></div>
    </div>
  </section>`;

  const script = chartScript([
    {
      id: "severityChart",
      config: {
        type: "doughnut",
        data: {
          labels: severity.map(([key]) => key),
          datasets: [{ data: severity.map(([, count]) => count), backgroundColor: CHART_COLORS }],
        },
        options: { plugins: { legend: { position: "bottom" } } },
      },
    },
    {
      id: "typeChart",
      config: {
        type: "bar",
        data: {
          labels: types.map(([key]) => key),
          datasets: [{ label: "Functions", data: types.map(([, count]) => count), backgroundColor: "#3b82f6" }],
        },
        options: { plugins: { legend: { display: false } }, scales: { y: { beginAtZero: true } } },
      },
    },
    {
      id: "projectChart",
      config: {
        type: "bar",
        data: {
          labels: projects.map(([id]) => displayName(id, names)),
          datasets: [{ label: "Functions", data: projects.map(([, count]) => count), backgroundColor: "#a855f7" }],
        },
        options: { indexAxis: "y", plugins: { legend: { display: false } } },
      },
    },
  ]);

  return { markup, script };
}

function buildCountTable(title: string, heading: string, rows: { label: string; count: number; mono?: boolean }[]): string {
  if (rows.length === 0) return "";

  const body = rows
    .map(
      (row, i) => `
      <tr>
        <td>${i + 1}</td>
        <td${row.mono ? ' class="mono"' : ""}>${escapeHtml(row.label)}</td>
        <td class="count-cell">${row.count}</td>
      </tr>`
    )
    .join("");

  return `
  <section>
    <h2>${escapeHtml(title)}</h2>
    <table class="data-table">
      <thead><tr><th>#</th><th>${escapeHtml(heading)}</th><th>Functions</th></tr></thead>
      <tbody>${body}</tbody>
    </table>
  </section>`;
}

function buildErrors(report: AggregateReport): string {
  if (report.errors.length === 0) return "";

  const items = report.errors
    .map(
      (e) => `
      <li><span class="mono">${escapeHtml(e.projectId)}</span> <span class="error-reason">${escapeHtml(e.error)}</span></li>`
    )
    .join("");

  return `
  <section>
    <h2>Failed Projects (${report.errors.length})</h2>
    <ul class="error-list">${items}</ul>
  </section>`;
}

// --- Main builder ---

export function buildHtml(report: AggregateReport, options: HtmlOptions = {}): string {
  const names = options.names ?? new Map<string, string>();
  const topN = options.topN ?? 20;
  const { summary } = report;
  const charts = buildCharts(report, names);

  const projectRows = rankEntries(report.byProject, topN).map(([id, count]) => ({
    label: displayName(id, names),
    count,
    mono: true,
  }));
  const ruleRows = rankEntries(report.byRule, topN).map(([rule, count]) => ({ label: rule, count }));

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8"/>
<meta name="viewport" content="width=device-width, initial-scale=1.0"/>
<title>Uncommented Function Report</title>
<style>${BASE_STYLE}</style>
</head>
<body>
<div class="container">
  <header class="header">
    <h1>Uncommented Function Report</h1>
    <p class="subtitle">Generated ${escapeHtml(displayTimestamp(options.now))}</p>
  </header>
${metaCards([
  { label: "Projects", value: String(summary.totalProjects) },
  { label: "Successful", value: String(summary.successfulProjects) },
  { label: "Failed", value: String(summary.failedProjects) },
  { label: "Uncommented functions", value: summary.totalFunctionCount.toLocaleString("en-US") },
])}
${charts.markup}
${buildCountTable(`Projects (Top ${topN})`, "Project", projectRows)}
${buildCountTable(`Rules (Top ${topN})`, "Rule", ruleRows)}
${buildErrors(report)}
<footer class="footer">Generated by quality-pulse</footer>
</div>
${charts.script}
</body>
</html>`;
}
