import { FetchResult, ProjectId } from "../analyzers/types";
import { describeError } from "../errors";
import { HttpClient } from "../http/client";
import { Logger, silentLogger } from "../logger";
import { SleepFn, sleep as defaultSleep } from "../util/time";

export type ProjectFetcherOptions = {
  url: string;
  buildPayload: (projectId: ProjectId) => unknown;
  /** Fixed pause between consecutive projects. */
  batchDelayMs?: number;
  logger?: Logger;
  sleep?: SleepFn;
  now?: () => Date;
};

/**
 * Walks a list of projects one at a time, posting one listing request per
 * project. A project that still fails after the client's own retries is
 * recorded as a failed result and the walk continues.
 */
export class ProjectFetcher {
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(
    private readonly http: HttpClient,
    private readonly options: ProjectFetcherOptions
  ) {
    this.logger = options.logger ?? silentLogger();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  async fetchOne(projectId: ProjectId): Promise<FetchResult> {
    try {
      const payload = await this.http.postJson(this.options.url, this.options.buildPayload(projectId));
      this.logger.info(`Project ${projectId} fetched`);
      return { ok: true, projectId, payload, timestamp: this.now().toISOString() };
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`Project ${projectId} failed: ${message}`);
      return { ok: false, projectId, error: message, timestamp: this.now().toISOString() };
    }
  }

  async fetchAll(projectIds: ProjectId[]): Promise<FetchResult[]> {
    const results: FetchResult[] = [];
    const total = projectIds.length;
    this.logger.info(`Fetching ${total} projects from ${this.options.url}`);

    for (const [index, projectId] of projectIds.entries()) {
      this.logger.info(`[${index + 1}/${total}] ${projectId}`);
      results.push(await this.fetchOne(projectId));

      if (index < total - 1) {
        await this.sleep(this.options.batchDelayMs ?? 500);
      }
    }

    const failed = results.filter((r) => !r.ok).length;
    this.logger.info(`Fetch complete: ${total - failed}/${total} succeeded`);
    return results;
  }
}
