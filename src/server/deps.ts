import { Request, RequestHandler, Response } from "express";
import { Logger } from "../logger";
import { ScheduledJob } from "../scheduler";
import { AnalysisService } from "../services/analysisService";
import { WeeklyService } from "../services/weeklyService";

export const SERVICE_NAME = "quality-pulse";

export type AppDeps = {
  env: string;
  version: string;
  outputDir: string;
  analysis: Pick<AnalysisService, "runUncommentedAnalysis" | "runDuplicateAnalysis" | "runAll">;
  weekly: Pick<WeeklyService, "generate" | "getCommits" | "findReports" | "listReports">;
  jobs: () => ScheduledJob[];
  logger: Logger;
};

/** Express 4 does not forward rejected promises; route them to the error middleware. */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
