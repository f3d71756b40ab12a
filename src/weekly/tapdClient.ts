import { z } from "zod";
import { stringField } from "../analyzers/decode";
import { CommitRecord, UpstreamRecord } from "../analyzers/types";
import { ApplicationError, UpstreamSchemaError } from "../errors";
import { HttpClient } from "../http/client";
import { Logger, silentLogger } from "../logger";

export const DEFAULT_TAPD_BASE_URL = "https://www.tapd.cn/api/devops/source_code";

/** Browser-like headers; the commit endpoint rejects bare clients. */
export const TAPD_HEADERS: Record<string, string> = {
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
  "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36",
  "Sec-Fetch-Dest": "empty",
  "Sec-Fetch-Mode": "cors",
  "Sec-Fetch-Site": "same-origin",
};

const scalar = z.union([z.string(), z.number()]);

const envelopeSchema = z.object({
  meta: z
    .object({
      code: scalar.transform(String).optional(),
      message: z.string().optional(),
    })
    .optional(),
  data: z
    .object({
      commits: z.array(z.record(z.unknown())).nullish(),
      total_count: scalar.nullish(),
    })
    .nullish(),
});

export type CommitPage = {
  commits: UpstreamRecord[];
  totalCount: number;
};

export type CommitQuery = {
  entityId: string;
  workspaceId: string;
  entityType?: string;
  relatedId?: string;
  scmType?: string;
  page?: number;
  perPage?: number;
};

export type TapdClientOptions = {
  baseUrl?: string;
  logger?: Logger;
};

export class TapdClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(
    private readonly http: HttpClient,
    options: TapdClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_TAPD_BASE_URL).replace(/\/+$/, "");
    this.logger = options.logger ?? silentLogger();
  }

  async fetchCommits(query: CommitQuery): Promise<CommitPage> {
    const page = query.page ?? 1;
    this.logger.info(`Fetching commits: entity_id=${query.entityId}, page=${page}`);

    const raw = await this.http.getJson(`${this.baseUrl}/get_related_commits`, {
      workspace_id: query.workspaceId,
      entity_id: query.entityId,
      entity_type: query.entityType ?? "story",
      related_id: query.relatedId ?? "-1",
      page,
      per_page: query.perPage ?? 100,
      scm_type: query.scmType ?? "gitlab",
    });

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamSchemaError(`Unexpected commit listing response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    const { meta, data } = parsed.data;
    if (meta?.code !== "0") {
      const message = meta?.message ?? "Unknown error";
      this.logger.error(`TAPD API error: ${message}`);
      throw new ApplicationError(`TAPD API error: ${message}`, meta?.code);
    }

    const commits = data?.commits ?? [];
    const totalCount = Number(data?.total_count ?? 0);
    this.logger.info(`Fetched ${commits.length} commits`);
    return { commits, totalCount: Number.isFinite(totalCount) ? totalCount : 0 };
  }

  /** Pages until an empty page or until `total_count` commits are collected. */
  async fetchAllCommits(query: Omit<CommitQuery, "page">): Promise<UpstreamRecord[]> {
    const all: UpstreamRecord[] = [];
    let page = 1;

    for (;;) {
      const { commits, totalCount } = await this.fetchCommits({ ...query, page });
      if (commits.length === 0) break;

      all.push(...commits);
      if (all.length >= totalCount) break;
      page++;
    }

    this.logger.info(`Total commits fetched: ${all.length}`);
    return all;
  }
}

export function extractCommitInfo(commits: UpstreamRecord[]): CommitRecord[] {
  return commits.map((commit) => ({
    message: stringField(commit, "message", ""),
    userName: stringField(commit, "user_name", ""),
    commitTime: stringField(commit, "commit_time", ""),
    commitId: stringField(commit, "commit_id", ""),
  }));
}
