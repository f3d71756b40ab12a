import { Router } from "express";
import { z } from "zod";
import { NotFoundError } from "../../errors";
import { listReports, resolveReportFile } from "../../services/reportFiles";
import { AppDeps, asyncHandler } from "../deps";
import { success } from "../response";

const listQuery = z.object({
  type: z.enum(["all", "uncommented", "duplicate"]).default("all"),
});

function sendStatus(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

export function createAnalysisRouter(deps: Pick<AppDeps, "analysis" | "outputDir" | "logger">): Router {
  const router = Router();
  const logger = deps.logger.child("analysis");

  router.post(
    "/uncommented/run",
    asyncHandler(async (_req, res) => {
      logger.info("Uncommented analysis requested");
      const result = await deps.analysis.runUncommentedAnalysis();
      res.json(success(result, "Uncommented function analysis completed"));
    })
  );

  router.post(
    "/duplicate/run",
    asyncHandler(async (_req, res) => {
      logger.info("Duplicate analysis requested");
      const result = await deps.analysis.runDuplicateAnalysis();
      res.json(success(result, "Duplicate function analysis completed"));
    })
  );

  router.post(
    "/all/run",
    asyncHandler(async (_req, res) => {
      logger.info("Full analysis requested");
      const result = await deps.analysis.runAll();
      res.json(success(result, "All analyses completed"));
    })
  );

  router.get("/reports", (req, res) => {
    const { type } = listQuery.parse(req.query);
    const reports = listReports(deps.outputDir, type);
    res.json(success({ reports, total: reports.length }));
  });

  router.get("/reports/:filename", (req, res, next) => {
    const file = resolveReportFile(deps.outputDir, req.params.filename);
    res.sendFile(file, (error) => {
      if (!error) return;
      // send reports refused files (dotfiles, vanished paths) as 404
      next(sendStatus(error) === 404 ? new NotFoundError(`Report not found: ${req.params.filename}`, { cause: error }) : error);
    });
  });

  return router;
}
