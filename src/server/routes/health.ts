import { Router } from "express";
import { AppDeps, SERVICE_NAME } from "../deps";
import { success } from "../response";

export function createHealthRouter(deps: Pick<AppDeps, "env" | "version" | "jobs">): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json(
      success({
        status: "healthy",
        service: SERVICE_NAME,
        version: deps.version,
        env: deps.env,
        timestamp: new Date().toISOString(),
      })
    );
  });

  router.get("/status", (_req, res) => {
    res.json(
      success({
        status: "running",
        env: deps.env,
        scheduledJobs: deps.jobs(),
        timestamp: new Date().toISOString(),
      })
    );
  });

  return router;
}
