import { once } from "events";
import * as fs from "fs";
import { Server } from "http";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ApplicationError, ConfigError, InvalidInputError, TransportError } from "../src/errors";
import { silentLogger } from "../src/logger";
import { createApp } from "../src/server/app";
import { AppDeps } from "../src/server/deps";
import { DuplicateRunResult, RunAllResult, UncommentedRunResult } from "../src/services/analysisService";
import { GeneratedReport, WeeklyReportContent } from "../src/services/weeklyService";

const uncommented: UncommentedRunResult = {
  status: "success",
  summary: { totalProjects: 2, successfulProjects: 2, failedProjects: 0, totalFunctionCount: 7 },
  reportFile: "output/uncommented_functions_report_20250110_073000.html",
  completedAt: "2025-01-10T07:30:00.000Z",
};

const duplicate: DuplicateRunResult = {
  status: "success",
  total: 2,
  successful: 1,
  failed: 1,
  completedAt: "2025-01-10T07:30:00.000Z",
};

const runAll: RunAllResult = {
  uncommented,
  duplicate: { status: "failed", error: "Missing required setting: duplicate_url" },
  completedAt: "2025-01-10T07:30:00.000Z",
};

const generated: GeneratedReport = { report: "# Weekly Summary", generatedAt: "2025-01-10T07:30:00.000Z" };

const stored: WeeklyReportContent = {
  fileName: "weekly_report_e1_20250110_073000.md",
  filePath: "output/weekly_reports/weekly_report_e1_20250110_073000.md",
  size: "0.1 KB",
  createdAt: "2025-01-10T07:30:00.000Z",
  content: "# Weekly Summary",
};

function fakeDeps(outputDir: string) {
  const analysis = {
    runUncommentedAnalysis: vi.fn(async () => uncommented),
    runDuplicateAnalysis: vi.fn(async () => duplicate),
    runAll: vi.fn(async () => runAll),
  };
  const weekly = {
    generate: vi.fn(async (_request: Parameters<AppDeps["weekly"]["generate"]>[0]) => generated),
    getCommits: vi.fn(async (_entityId: string, _workspaceId: string) => [
      { message: "fix paging", userName: "bob", commitTime: "2025-01-07 15:20", commitId: "c2" },
    ]),
    findReports: vi.fn((_entityId: string, _latestOnly?: boolean) => [stored]),
    listReports: vi.fn(() => [stored]),
  };
  const deps: AppDeps = {
    env: "test",
    version: "1.0.0",
    outputDir,
    analysis,
    weekly,
    jobs: () => [{ id: "daily_analysis", name: "Daily code analysis", nextRun: "2025-01-11T07:00:00.000Z" }],
    logger: silentLogger(),
  };
  return { deps, analysis, weekly };
}

describe("REST API", () => {
  let dir: string;
  let server: Server | undefined;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "server-test-"));
  });

  afterEach(async () => {
    if (server) {
      const closing = server;
      closing.closeAllConnections();
      await new Promise<void>((resolve, reject) => closing.close((error) => (error ? reject(error) : resolve())));
      server = undefined;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function start(deps: AppDeps): Promise<string> {
    const listening = createApp(deps).listen(0, "127.0.0.1");
    server = listening;
    await once(listening, "listening");
    const address = listening.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    return `http://127.0.0.1:${address.port}`;
  }

  function postJson(url: string, body: unknown): Promise<Response> {
    return fetch(url, { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });
  }

  it("reports health and schedule status", async () => {
    const base = await start(fakeDeps(dir).deps);

    const health = await fetch(`${base}/api/health`);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({
      success: true,
      data: { status: "healthy", service: "quality-pulse", version: "1.0.0", env: "test" },
    });

    const status = await fetch(`${base}/api/status`);
    expect(await status.json()).toMatchObject({
      success: true,
      data: {
        status: "running",
        env: "test",
        scheduledJobs: [{ id: "daily_analysis", name: "Daily code analysis", nextRun: "2025-01-11T07:00:00.000Z" }],
      },
    });
  });

  it("runs analyses on demand", async () => {
    const { deps, analysis } = fakeDeps(dir);
    const base = await start(deps);

    const response = await fetch(`${base}/api/analysis/uncommented/run`, { method: "POST" });
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      success: true,
      data: uncommented,
      message: "Uncommented function analysis completed",
    });

    const all = await fetch(`${base}/api/analysis/all/run`, { method: "POST" });
    expect(await all.json()).toMatchObject({ success: true, data: runAll, message: "All analyses completed" });
    expect(analysis.runUncommentedAnalysis).toHaveBeenCalledTimes(1);
    expect(analysis.runAll).toHaveBeenCalledTimes(1);
  });

  it("maps service failures to status codes", async () => {
    const { deps, analysis } = fakeDeps(dir);
    analysis.runUncommentedAnalysis.mockRejectedValueOnce(new ConfigError("Missing required setting: token"));
    analysis.runDuplicateAnalysis.mockRejectedValueOnce(new TransportError("HTTP 503 from upstream: down", { status: 503, attempts: 3 }));
    analysis.runAll.mockRejectedValueOnce(new Error("disk full"));
    const base = await start(deps);

    const config = await fetch(`${base}/api/analysis/uncommented/run`, { method: "POST" });
    expect(config.status).toBe(500);
    expect(await config.json()).toMatchObject({
      success: false,
      error: { code: "CONFIG_ERROR", message: "Missing required setting: token" },
    });

    const upstream = await fetch(`${base}/api/analysis/duplicate/run`, { method: "POST" });
    expect(upstream.status).toBe(502);
    expect(await upstream.json()).toMatchObject({ error: { code: "UPSTREAM_ERROR", message: "HTTP 503 from upstream: down" } });

    const internal = await fetch(`${base}/api/analysis/all/run`, { method: "POST" });
    expect(internal.status).toBe(500);
    expect(await internal.json()).toMatchObject({ error: { code: "INTERNAL_ERROR", message: "disk full" } });
  });

  it("lists and serves report files", async () => {
    fs.writeFileSync(path.join(dir, "duplicate_functions_report_20250111_073000.html"), "<html>dup</html>");
    const base = await start(fakeDeps(dir).deps);

    const list = await fetch(`${base}/api/analysis/reports?type=duplicate`);
    expect(await list.json()).toMatchObject({
      success: true,
      data: { total: 1, reports: [{ name: "duplicate_functions_report_20250111_073000.html", type: "duplicate" }] },
    });

    const file = await fetch(`${base}/api/analysis/reports/duplicate_functions_report_20250111_073000.html`);
    expect(file.status).toBe(200);
    expect(await file.text()).toBe("<html>dup</html>");

    const missing = await fetch(`${base}/api/analysis/reports/nope.html`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: { code: "NOT_FOUND", message: "Report not found: nope.html" } });

    const escape = await fetch(`${base}/api/analysis/reports/..%2Fsecret.html`);
    expect(escape.status).toBe(404);
  });

  it("answers 404 for report files the file sender refuses", async () => {
    fs.writeFileSync(path.join(dir, ".hidden.html"), "<html>hidden</html>");
    const base = await start(fakeDeps(dir).deps);

    const response = await fetch(`${base}/api/analysis/reports/.hidden.html`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { code: "NOT_FOUND", message: "Report not found: .hidden.html" } });
  });

  it("rejects an unknown report type", async () => {
    const base = await start(fakeDeps(dir).deps);

    const response = await fetch(`${base}/api/analysis/reports?type=weekly`);
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: "BAD_REQUEST", message: "Invalid request" } });
  });

  it("generates a weekly report from a snake_case body", async () => {
    const { deps, weekly } = fakeDeps(dir);
    const base = await start(deps);

    const response = await postJson(`${base}/api/weekly-report/generate`, {
      entity_id: "e1",
      workspace_id: "ws",
      custom_prompt: "Be brief.",
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ success: true, data: generated, message: "Weekly report generated" });
    expect(weekly.generate).toHaveBeenCalledWith({
      entityId: "e1",
      workspaceId: "ws",
      customPrompt: "Be brief.",
      saveToFile: true,
    });
  });

  it("validates the weekly request body", async () => {
    const base = await start(fakeDeps(dir).deps);

    const response = await postJson(`${base}/api/weekly-report/generate`, { entity_id: "e1" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: "BAD_REQUEST", message: "Invalid request", details: [{ path: "workspace_id", message: "Required" }] },
    });
  });

  it("rejects entity ids that are not plain identifiers", async () => {
    const { deps, weekly } = fakeDeps(dir);
    const base = await start(deps);

    const response = await postJson(`${base}/api/weekly-report/generate`, { entity_id: "/../../escaped", workspace_id: "ws" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: {
        code: "BAD_REQUEST",
        details: [{ path: "entity_id", message: "entity_id may only contain letters, digits, _ and -" }],
      },
    });
    expect(weekly.generate).not.toHaveBeenCalled();
  });

  it("answers 400 when the service refuses an entity id", async () => {
    const { deps, weekly } = fakeDeps(dir);
    weekly.generate.mockRejectedValueOnce(new InvalidInputError('Invalid entity id "x"'));
    const base = await start(deps);

    const response = await postJson(`${base}/api/weekly-report/generate`, { entity_id: "x", workspace_id: "ws" });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error: { code: "BAD_REQUEST", message: 'Invalid entity id "x"' } });
  });

  it("rejects malformed JSON", async () => {
    const base = await start(fakeDeps(dir).deps);

    const response = await fetch(`${base}/api/weekly-report/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ success: false, error: { code: "BAD_REQUEST" } });
  });

  it("reports TAPD envelope errors as upstream failures", async () => {
    const { deps, weekly } = fakeDeps(dir);
    weekly.getCommits.mockRejectedValueOnce(new ApplicationError("TAPD API error: no access", "403"));
    const base = await start(deps);

    const response = await postJson(`${base}/api/weekly-report/commits`, { entity_id: "e1", workspace_id: "ws" });

    expect(response.status).toBe(502);
    expect(await response.json()).toMatchObject({ error: { code: "UPSTREAM_ERROR", message: "TAPD API error: no access" } });
  });

  it("returns commits for an entity", async () => {
    const base = await start(fakeDeps(dir).deps);

    const response = await postJson(`${base}/api/weekly-report/commits`, { entity_id: "e1", workspace_id: "ws" });

    expect(await response.json()).toMatchObject({
      success: true,
      data: { total: 1, commits: [{ userName: "bob", commitId: "c2" }] },
    });
  });

  it("downloads a weekly report as markdown without saving it", async () => {
    const { deps, weekly } = fakeDeps(dir);
    const base = await start(deps);

    const response = await postJson(`${base}/api/weekly-report/download`, { entity_id: "e-1", workspace_id: "ws" });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/markdown; charset=utf-8");
    expect(response.headers.get("content-disposition")).toMatch(/^attachment; filename="weekly_report_e-1_\d{8}_\d{6}\.md"$/);
    expect(await response.text()).toBe("# Weekly Summary");
    expect(weekly.generate).toHaveBeenCalledWith({ entityId: "e-1", workspaceId: "ws", customPrompt: undefined, saveToFile: false });
  });

  it("finds and lists saved weekly reports", async () => {
    const { deps, weekly } = fakeDeps(dir);
    const base = await start(deps);

    const found = await fetch(`${base}/api/weekly-report/find?entity_id=e1&latest=true`);
    expect(await found.json()).toMatchObject({ success: true, data: { entityId: "e1", total: 1, reports: [stored] } });
    expect(weekly.findReports).toHaveBeenCalledWith("e1", true);

    const list = await fetch(`${base}/api/weekly-report/list`);
    expect(await list.json()).toMatchObject({ success: true, data: { total: 1, reports: [stored] } });

    const missing = await fetch(`${base}/api/weekly-report/find`);
    expect(missing.status).toBe(400);
  });

  it("answers unknown routes with 404", async () => {
    const base = await start(fakeDeps(dir).deps);

    const response = await fetch(`${base}/api/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: "NOT_FOUND", message: "Route not found: GET /api/nope" },
    });
  });
});
