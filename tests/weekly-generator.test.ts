import { describe, expect, it, vi } from "vitest";
import { CommitRecord } from "../src/analyzers/types";
import { FetchFn, HttpClient } from "../src/http/client";
import { NO_COMMITS_MESSAGE, WeeklyReportGenerator, buildDefaultPrompt } from "../src/weekly/generator";
import { NarrativeModel } from "../src/weekly/narrative";
import { TapdClient } from "../src/weekly/tapdClient";

function commit(userName: string, message: string, commitTime = "2025-01-06 10:00"): CommitRecord {
  return { userName, message, commitTime, commitId: `${userName}-${message}` };
}

function tapdReturning(rawCommits: Record<string, unknown>[]): TapdClient {
  const fetch = vi.fn<FetchFn>(
    async () =>
      new Response(JSON.stringify({ meta: { code: "0" }, data: { commits: rawCommits, total_count: rawCommits.length } }), {
        status: 200,
      })
  );
  return new TapdClient(new HttpClient({ retryTimes: 1, fetch }), { baseUrl: "https://tapd.test" });
}

function fakeModel(reply: string) {
  const complete = vi.fn(async (_prompt: string) => reply);
  const model: NarrativeModel = { complete };
  return { model, complete };
}

describe("buildDefaultPrompt", () => {
  it("groups commits by author in first-seen order", () => {
    const prompt = buildDefaultPrompt([
      commit("bob", "  add parser  "),
      commit("amy", "fix build"),
      commit("bob", "tests", ""),
    ]);

    expect(prompt).toContain(
      "## Commit Details\n\n" +
        "### bob (2 commits)\n\n" +
        "- **Time**: 2025-01-06 10:00\n  **Message**: add parser\n\n" +
        "- **Time**: N/A\n  **Message**: tests\n\n" +
        "### amy (1 commits)\n\n" +
        "- **Time**: 2025-01-06 10:00\n  **Message**: fix build\n\n"
    );
    expect(prompt).toContain("# Weekly Summary");
  });
});

describe("WeeklyReportGenerator", () => {
  it("returns the fixed message without calling the model when there are no commits", async () => {
    const { model, complete } = fakeModel("unused");
    const generator = new WeeklyReportGenerator(tapdReturning([]), model);

    await expect(generator.generate("e1", "w1")).resolves.toBe(NO_COMMITS_MESSAGE);
    expect(NO_COMMITS_MESSAGE).toBe("No commits found.");
    expect(complete).not.toHaveBeenCalled();
  });

  it("sends the built prompt to the model", async () => {
    const { model, complete } = fakeModel("# Weekly Summary\n...");
    const generator = new WeeklyReportGenerator(
      tapdReturning([{ message: "ship it", user_name: "amy", commit_time: "2025-01-07 09:00", commit_id: "c1" }]),
      model
    );

    await expect(generator.generate("e1", "w1")).resolves.toBe("# Weekly Summary\n...");
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0]?.[0]).toContain("### amy (1 commits)");
  });

  it("uses a custom prompt verbatim", async () => {
    const { model, complete } = fakeModel("ok");
    const generator = new WeeklyReportGenerator(
      tapdReturning([{ message: "m", user_name: "amy", commit_time: "t", commit_id: "c1" }]),
      model
    );

    await generator.generate("e1", "w1", "Summarize in one line.");

    expect(complete).toHaveBeenCalledWith("Summarize in one line.");
  });

  it("propagates model failures", async () => {
    const model: NarrativeModel = { complete: async () => Promise.reject(new Error("rate limited")) };
    const generator = new WeeklyReportGenerator(
      tapdReturning([{ message: "m", user_name: "amy", commit_time: "t", commit_id: "c1" }]),
      model
    );

    await expect(generator.generate("e1", "w1")).rejects.toThrow("rate limited");
  });
});
