import { Router } from "express";
import { z } from "zod";
import { ENTITY_ID } from "../../services/weeklyService";
import { fileTimestamp } from "../../util/time";
import { AppDeps, asyncHandler } from "../deps";
import { success } from "../response";

const entityId = z
  .string()
  .min(1, "entity_id is required")
  .regex(ENTITY_ID, "entity_id may only contain letters, digits, _ and -");

const entityBody = z.object({
  entity_id: entityId,
  workspace_id: z.string().min(1, "workspace_id is required"),
});

const generateBody = entityBody.extend({
  custom_prompt: z.string().optional(),
  save_to_file: z.boolean().default(true),
});

const findQuery = z.object({
  entity_id: entityId,
  latest: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase() === "true"),
});

function attachmentName(entityId: string): string {
  return `weekly_report_${entityId}_${fileTimestamp()}.md`;
}

export function createWeeklyRouter(deps: Pick<AppDeps, "weekly" | "logger">): Router {
  const router = Router();
  const logger = deps.logger.child("weekly");

  router.post(
    "/generate",
    asyncHandler(async (req, res) => {
      const body = generateBody.parse(req.body ?? {});
      logger.info(`Weekly report requested: entity_id=${body.entity_id}`);
      const result = await deps.weekly.generate({
        entityId: body.entity_id,
        workspaceId: body.workspace_id,
        customPrompt: body.custom_prompt,
        saveToFile: body.save_to_file,
      });
      res.json(success(result, "Weekly report generated"));
    })
  );

  router.post(
    "/download",
    asyncHandler(async (req, res) => {
      const body = generateBody.parse(req.body ?? {});
      const result = await deps.weekly.generate({
        entityId: body.entity_id,
        workspaceId: body.workspace_id,
        customPrompt: body.custom_prompt,
        saveToFile: false,
      });
      res.setHeader("Content-Type", "text/markdown; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${attachmentName(body.entity_id)}"`);
      res.send(result.report);
    })
  );

  router.get("/list", (_req, res) => {
    const reports = deps.weekly.listReports();
    res.json(success({ reports, total: reports.length }));
  });

  router.get("/find", (req, res) => {
    const query = findQuery.parse(req.query);
    const reports = deps.weekly.findReports(query.entity_id, query.latest);
    res.json(success({ entityId: query.entity_id, reports, total: reports.length }));
  });

  router.post(
    "/commits",
    asyncHandler(async (req, res) => {
      const body = entityBody.parse(req.body ?? {});
      const commits = await deps.weekly.getCommits(body.entity_id, body.workspace_id);
      res.json(success({ commits, total: commits.length }));
    })
  );

  return router;
}
