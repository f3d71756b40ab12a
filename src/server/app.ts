import express, { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { ApplicationError, ConfigError, InvalidInputError, NotFoundError, TransportError, describeError } from "../errors";
import { AppDeps } from "./deps";
import { ErrorCode, failure } from "./response";
import { createAnalysisRouter } from "./routes/analysis";
import { createHealthRouter } from "./routes/health";
import { createWeeklyRouter } from "./routes/weekly";

export function errorStatus(error: unknown): { status: number; code: ErrorCode } {
  if (error instanceof ZodError) return { status: 400, code: "BAD_REQUEST" };
  if (error instanceof SyntaxError || error instanceof InvalidInputError) return { status: 400, code: "BAD_REQUEST" };
  if (error instanceof NotFoundError) return { status: 404, code: "NOT_FOUND" };
  if (error instanceof ConfigError) return { status: 500, code: "CONFIG_ERROR" };
  if (error instanceof ApplicationError || error instanceof TransportError) return { status: 502, code: "UPSTREAM_ERROR" };
  return { status: 500, code: "INTERNAL_ERROR" };
}

export function createApp(deps: AppDeps): express.Express {
  const logger = deps.logger;
  const app = express();
  app.use(express.json());

  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.use("/api", createHealthRouter(deps));
  app.use("/api/analysis", createAnalysisRouter(deps));
  app.use("/api/weekly-report", createWeeklyRouter(deps));

  app.use((req, res) => {
    res.status(404).json(failure("NOT_FOUND", `Route not found: ${req.method} ${req.path}`));
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    const { status, code } = errorStatus(error);
    const details = error instanceof ZodError ? error.issues.map((i) => ({ path: i.path.join("."), message: i.message })) : undefined;
    const message = error instanceof ZodError ? "Invalid request" : describeError(error);
    if (status >= 500) {
      logger.error(`${req.method} ${req.path} failed: ${message}`);
    } else {
      logger.warn(`${req.method} ${req.path} rejected: ${message}`);
    }
    res.status(status).json(failure(code, message, details));
  });

  return app;
}
