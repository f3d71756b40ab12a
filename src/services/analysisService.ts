import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { classify } from "../analyzers/classify";
import { summarizeDuplicates } from "../analyzers/duplicates";
import { AggregateReport, AggregateSummary, FetchResult } from "../analyzers/types";
import { Settings, requireSetting } from "../config";
import { ConfigError, NotFoundError, describeError } from "../errors";
import { buildDuplicatePayload, buildListingPayload } from "../fetchers/payloads";
import { ProjectFetcher } from "../fetchers/projectFetcher";
import { loadRepoIds, loadRepoNames } from "../fetchers/repoIds";
import { HttpClient } from "../http/client";
import { Logger } from "../logger";
import { Palette, createPalette } from "../palette";
import {
  formatAnalysisReport,
  formatDuplicateReport,
  formatSummary,
  latestSnapshot,
  tryRender,
  writeDuplicateCsv,
  writeDuplicateHtmlReport,
  writeHtmlReport,
  writeJsonSnapshot,
  writeMarkdownReport,
  writeRecordsCsv,
} from "../reporter";
import { SleepFn, fileTimestamp, secondsToMs } from "../util/time";

export type UncommentedRunResult = {
  status: "success";
  summary: AggregateSummary;
  reportFile?: string;
  completedAt: string;
};

export type DuplicateRunResult = {
  status: "success";
  total: number;
  successful: number;
  failed: number;
  reportFile?: string;
  completedAt: string;
};

export type FailedRun = { status: "failed"; error: string };

export type RunAllResult = {
  uncommented: UncommentedRunResult | FailedRun;
  duplicate: DuplicateRunResult | FailedRun;
  completedAt: string;
};

export type AnalyzeDataOptions = {
  file?: string;
  exportCsv?: boolean;
  exportHtml?: boolean;
};

export type AnalyzeDataResult = {
  file: string;
  summary: AggregateSummary;
  csvFile?: string;
  htmlFile?: string;
};

export type AnalysisServiceOptions = {
  http: HttpClient;
  logger: Logger;
  palette?: Palette;
  /** Console sink for the human-readable summaries. */
  print?: (text: string) => void;
  sleep?: SleepFn;
  now?: () => Date;
};

const histogramSchema = z.array(z.tuple([z.string(), z.number()]));

const snapshotSchema = z.object({
  summary: z.object({
    totalProjects: z.number(),
    successfulProjects: z.number(),
    failedProjects: z.number(),
    totalFunctionCount: z.number(),
  }),
  bySeverity: histogramSchema,
  byType: histogramSchema,
  byRule: histogramSchema,
  byProject: histogramSchema,
  allRecords: z.array(z.object({ projectId: z.string() }).passthrough()),
  errors: z.array(z.object({ projectId: z.string(), error: z.string() })),
});

export class AnalysisService {
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly palette: Palette;
  private readonly print: (text: string) => void;
  private readonly sleep?: SleepFn;
  private readonly now: () => Date;

  constructor(
    private readonly settings: Settings,
    options: AnalysisServiceOptions
  ) {
    this.http = options.http;
    this.logger = options.logger;
    this.palette = options.palette ?? createPalette(false);
    this.print = options.print ?? ((text) => process.stdout.write(`${text}\n`));
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());
  }

  private get outputDir(): string {
    return this.settings.output.outputDir;
  }

  private fetcher(url: string, buildPayload: (projectId: string) => unknown): ProjectFetcher {
    return new ProjectFetcher(this.http, {
      url,
      buildPayload,
      batchDelayMs: secondsToMs(this.settings.request.batchDelaySeconds),
      logger: this.logger.child("fetcher"),
      sleep: this.sleep,
      now: this.now,
    });
  }

  private names(): Map<string, string> {
    return loadRepoNames(this.settings.merico.repoNamesFile, this.logger);
  }

  private async fetchAll(url: string, buildPayload: (projectId: string) => unknown): Promise<FetchResult[]> {
    requireSetting(this.settings.merico.token, "token");
    const projectIds = loadRepoIds(this.settings.merico.repoIdsFile);
    this.logger.info(`Loaded ${projectIds.length} project ids`);
    return this.fetcher(url, buildPayload).fetchAll(projectIds);
  }

  async runUncommentedAnalysis(): Promise<UncommentedRunResult> {
    const url = requireSetting(this.settings.merico.apiUrl, "api_url");
    const { pageSize } = this.settings.request;
    const { authors } = this.settings.merico;
    const pretty = this.settings.output.prettyPrint;

    this.logger.info("Starting uncommented function analysis");
    const results = await this.fetchAll(url, (id) => buildListingPayload(id, { pageSize, authors }));
    const now = this.now();
    const stamp = fileTimestamp(now);

    tryRender(this.logger, "raw results snapshot", () =>
      writeJsonSnapshot(results, this.outputDir, "raw_results", { pretty, now })
    );
    const report = classify(results);
    if (this.settings.output.saveClassified) {
      tryRender(this.logger, "classified results snapshot", () =>
        writeJsonSnapshot(report, this.outputDir, "classified_results", { pretty, now })
      );
    }

    const names = this.names();
    const topN = this.settings.report.topN;
    const reportFile = tryRender(this.logger, "HTML report", () =>
      writeHtmlReport(report, this.outputDir, { names, topN, now })
    );
    tryRender(this.logger, "CSV export", () =>
      writeRecordsCsv(report.allRecords, path.join(this.outputDir, `uncommented_functions_${stamp}.csv`))
    );
    tryRender(this.logger, "Markdown summary", () => writeMarkdownReport(report, this.outputDir, now));
    tryRender(this.logger, "console summary", () =>
      this.print(formatSummary(report, { palette: this.palette, topN, names, now }).join("\n"))
    );

    this.logger.info(`Uncommented analysis complete: ${report.summary.totalFunctionCount} functions`);
    return { status: "success", summary: report.summary, reportFile, completedAt: now.toISOString() };
  }

  async runDuplicateAnalysis(): Promise<DuplicateRunResult> {
    const url = requireSetting(this.settings.merico.duplicateUrl, "duplicate_url");
    const { pageSize } = this.settings.request;
    const { authors } = this.settings.merico;

    this.logger.info("Starting duplicate function analysis");
    const results = await this.fetchAll(url, (id) => buildDuplicatePayload(id, { pageSize, authors }));
    const now = this.now();
    const stamp = fileTimestamp(now);

    tryRender(this.logger, "duplicate results snapshot", () =>
      writeJsonSnapshot(results, this.outputDir, "duplicate_functions", { pretty: this.settings.output.prettyPrint, now })
    );
    const report = summarizeDuplicates(results);

    const names = this.names();
    const reportFile = tryRender(this.logger, "duplicate HTML report", () =>
      writeDuplicateHtmlReport(report, this.outputDir, { names, now })
    );
    tryRender(this.logger, "duplicate CSV export", () =>
      writeDuplicateCsv(report.topGroups, names, path.join(this.outputDir, `duplicate_functions_${stamp}.csv`))
    );
    tryRender(this.logger, "duplicate console summary", () =>
      this.print(formatDuplicateReport(report, { palette: this.palette, topN: this.settings.report.topN, names, now }))
    );

    const failed = report.errors.length;
    this.logger.info(`Duplicate analysis complete: ${report.totalGroups} groups`);
    return {
      status: "success",
      total: results.length,
      successful: results.length - failed,
      failed,
      reportFile,
      completedAt: now.toISOString(),
    };
  }

  /** Both analyses; one failing does not stop the other. */
  async runAll(): Promise<RunAllResult> {
    const uncommented = await this.runUncommentedAnalysis().catch((error: unknown): FailedRun => {
      this.logger.error(`Uncommented analysis failed: ${describeError(error)}`);
      return { status: "failed", error: describeError(error) };
    });
    const duplicate = await this.runDuplicateAnalysis().catch((error: unknown): FailedRun => {
      this.logger.error(`Duplicate analysis failed: ${describeError(error)}`);
      return { status: "failed", error: describeError(error) };
    });
    return { uncommented, duplicate, completedAt: this.now().toISOString() };
  }

  loadSnapshot(file: string): AggregateReport {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, "utf-8"));
    } catch (error) {
      throw new ConfigError(`Cannot read classified results ${file}: ${describeError(error)}`, { cause: error });
    }
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`${file} is not a classified results snapshot`);
    }
    return parsed.data;
  }

  /** Offline analysis of a saved classified snapshot, newest by default. */
  analyzeData(options: AnalyzeDataOptions = {}): AnalyzeDataResult {
    const file = options.file ?? latestSnapshot(this.outputDir, "classified_results");
    if (file === undefined) {
      throw new NotFoundError(`No classified results found in ${this.outputDir}`);
    }
    if (!fs.existsSync(file)) {
      throw new NotFoundError(`Data file not found: ${file}`);
    }

    this.logger.info(`Analyzing ${file}`);
    const report = this.loadSnapshot(file);
    const now = this.now();
    const names = this.names();
    const topN = this.settings.report.topN;

    this.print(formatAnalysisReport(report, { palette: this.palette, topN, names, now }));

    const result: AnalyzeDataResult = { file, summary: report.summary };
    if (options.exportCsv) {
      result.csvFile = tryRender(this.logger, "CSV export", () =>
        writeRecordsCsv(report.allRecords, path.join(this.outputDir, `uncommented_functions_${fileTimestamp(now)}.csv`))
      );
    }
    if (options.exportHtml) {
      result.htmlFile = tryRender(this.logger, "HTML report", () =>
        writeHtmlReport(report, this.outputDir, { names, topN, now })
      );
    }
    return result;
  }
}
