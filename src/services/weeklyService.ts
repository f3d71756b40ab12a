import * as fs from "fs";
import * as path from "path";
import { CommitRecord } from "../analyzers/types";
import { InvalidInputError } from "../errors";
import { Logger } from "../logger";
import { fileTimestamp } from "../util/time";
import { WeeklyReportGenerator } from "../weekly/generator";
import { StoredFile, listFiles } from "./reportFiles";

export type GenerateRequest = {
  entityId: string;
  workspaceId: string;
  customPrompt?: string;
  saveToFile?: boolean;
};

export type GeneratedReport = {
  report: string;
  generatedAt: string;
  filePath?: string;
};

export type WeeklyReportFile = {
  fileName: string;
  filePath: string;
  size: string;
  createdAt: string;
};

export type WeeklyReportContent = WeeklyReportFile & { content: string };

export type WeeklyServiceOptions = {
  logger: Logger;
  now?: () => Date;
};

/** Entity ids end up in report file names. */
export const ENTITY_ID = /^[\w-]+$/;

const WEEKLY_FILE = /^weekly_report_.+_\d{8}_\d{6}\.md$/;
const STAMP_SUFFIX = /^\d{8}_\d{6}\.md$/;

function toReportFile(file: StoredFile): WeeklyReportFile {
  return { fileName: file.name, filePath: file.path, size: file.size, createdAt: file.createdAt };
}

export class WeeklyService {
  readonly reportDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly generator: WeeklyReportGenerator,
    outputDir: string,
    options: WeeklyServiceOptions
  ) {
    this.reportDir = path.join(outputDir, "weekly_reports");
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async generate(request: GenerateRequest): Promise<GeneratedReport> {
    if (!ENTITY_ID.test(request.entityId)) {
      throw new InvalidInputError(`Invalid entity id "${request.entityId}": only letters, digits, _ and - are allowed`);
    }
    this.logger.info(`Generating weekly report: entity_id=${request.entityId}`);
    const report = await this.generator.generate(request.entityId, request.workspaceId, request.customPrompt);
    const now = this.now();
    const result: GeneratedReport = { report, generatedAt: now.toISOString() };

    if (request.saveToFile ?? true) {
      fs.mkdirSync(this.reportDir, { recursive: true });
      const filePath = path.join(this.reportDir, `weekly_report_${request.entityId}_${fileTimestamp(now)}.md`);
      if (path.dirname(filePath) !== this.reportDir) {
        throw new InvalidInputError(`Report path escapes ${this.reportDir}: ${filePath}`);
      }
      fs.writeFileSync(filePath, report, "utf-8");
      this.logger.info(`Report saved to ${filePath}`);
      result.filePath = filePath;
    }
    return result;
  }

  getCommits(entityId: string, workspaceId: string): Promise<CommitRecord[]> {
    this.logger.info(`Fetching commits: entity_id=${entityId}`);
    return this.generator.commits(entityId, workspaceId);
  }

  /** Saved reports for one entity, newest first, with their contents. */
  findReports(entityId: string, latestOnly = false): WeeklyReportContent[] {
    const prefix = `weekly_report_${entityId}_`;
    const files = listFiles(
      this.reportDir,
      (name) => name.startsWith(prefix) && STAMP_SUFFIX.test(name.slice(prefix.length))
    ).sort((a, b) => b.name.localeCompare(a.name)); // names carry the timestamp
    const selected = latestOnly ? files.slice(0, 1) : files;
    return selected.map((file) => ({ ...toReportFile(file), content: fs.readFileSync(file.path, "utf-8") }));
  }

  listReports(): WeeklyReportFile[] {
    return listFiles(this.reportDir, (name) => WEEKLY_FILE.test(name))
      .sort((a, b) => b.name.localeCompare(a.name))
      .map(toReportFile);
  }
}
