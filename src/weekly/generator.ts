import { CommitRecord } from "../analyzers/types";
import { Logger, silentLogger } from "../logger";
import { NarrativeModel } from "./narrative";
import { TapdClient, extractCommitInfo } from "./tapdClient";

export const NO_COMMITS_MESSAGE = "No commits found.";

const REPORT_INSTRUCTIONS = `Write the weekly report in this format:

# Weekly Summary

## 1. Overview
A short overview of this week's main work and results.

## 2. Work Details
Grouped by feature area or task, describe:
# 1. Features completed or issues fixed
# 2. Technical highlights and implementation approach
# 3. Challenges met and how they were solved

Make sure to:
- keep the language professional and concise
- highlight the most important work
- group and summarize sensibly
- avoid simply listing commit messages
`;

/** Groups commits by author, in first-seen order, under a per-author heading. */
export function buildDefaultPrompt(commits: CommitRecord[]): string {
  const byAuthor = new Map<string, CommitRecord[]>();
  for (const commit of commits) {
    const list = byAuthor.get(commit.userName) ?? [];
    list.push(commit);
    byAuthor.set(commit.userName, list);
  }

  let details = "## Commit Details\n\n";
  for (const [userName, list] of byAuthor) {
    details += `### ${userName} (${list.length} commits)\n\n`;
    for (const commit of list) {
      details += `- **Time**: ${commit.commitTime || "N/A"}\n`;
      details += `  **Message**: ${commit.message.trim()}\n\n`;
    }
  }

  return `Write a professional technical weekly report based on the following commit history.

${details}
${REPORT_INSTRUCTIONS}`;
}

export type WeeklyReportGeneratorOptions = {
  logger?: Logger;
};

export class WeeklyReportGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly tapd: TapdClient,
    private readonly model: NarrativeModel,
    options: WeeklyReportGeneratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  async commits(entityId: string, workspaceId: string): Promise<CommitRecord[]> {
    const raw = await this.tapd.fetchAllCommits({ entityId, workspaceId });
    return extractCommitInfo(raw);
  }

  async generate(entityId: string, workspaceId: string, customPrompt?: string): Promise<string> {
    this.logger.info(`Starting report generation: entity_id=${entityId}`);
    const commits = await this.commits(entityId, workspaceId);

    if (commits.length === 0) {
      this.logger.warn("No commits found");
      return NO_COMMITS_MESSAGE;
    }

    const prompt = customPrompt || buildDefaultPrompt(commits);
    this.logger.info(`Generating weekly report with ${commits.length} commits`);
    const report = await this.model.complete(prompt);
    this.logger.info("Weekly report generated");
    return report;
  }
}
