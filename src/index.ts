#!/usr/bin/env node

import { Command, Option } from "commander";
import { Settings, loadSettings } from "./config";
import { Runtime, VERSION, createRuntime } from "./context";
import { describeError } from "./errors";
import { Logger, createLogger, logFilePath } from "./logger";
import { createPalette } from "./palette";
import { DailyScheduler } from "./scheduler";
import { createApp } from "./server/app";

type GlobalOptions = { config: string };

const program = new Command();

program
  .name("quality-pulse")
  .description("Code-quality reporting: uncommented and duplicate function analysis plus weekly commit reports")
  .version(VERSION)
  .option("-c, --config <path>", "Path to the JSON config file", "config.json");

function bootstrap(logPrefix: string, overrides: (settings: Settings) => Settings = (s) => s): Runtime {
  const color = Boolean(process.stderr.isTTY);
  const { config } = program.opts<GlobalOptions>();
  const settings = overrides(loadSettings(config, createLogger({ color })));
  const logger: Logger = createLogger({
    level: settings.server.debug ? "debug" : "info",
    color,
    logFile: logFilePath(settings.output.logDir, logPrefix),
  });
  return createRuntime(settings, logger, createPalette(Boolean(process.stdout.isTTY)));
}

async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error("Error:", describeError(error));
    process.exit(1);
  }
}

program
  .command("serve")
  .description("Start the REST API and the daily analysis schedule")
  .option("--host <host>", "Bind address (overrides config)")
  .option("--port <port>", "Port (overrides config)")
  .option("--debug", "Verbose logging")
  .action((options: { host?: string; port?: string; debug?: boolean }) =>
    run(async () => {
      const runtime = bootstrap("api", (settings) => ({
        ...settings,
        server: {
          host: options.host ?? settings.server.host,
          port: options.port !== undefined ? Number(options.port) : settings.server.port,
          debug: options.debug ?? settings.server.debug,
        },
      }));
      const { settings, logger } = runtime;
      if (!Number.isInteger(settings.server.port) || settings.server.port <= 0) {
        throw new Error(`Invalid --port value: "${options.port}"`);
      }

      const scheduler = settings.schedule.enabled
        ? new DailyScheduler({
            id: "daily_analysis",
            name: "Daily code analysis",
            hour: settings.schedule.hour,
            minute: settings.schedule.minute,
            task: () => runtime.analysis.runAll(),
            logger: logger.child("scheduler"),
          })
        : undefined;

      const app = createApp({
        env: settings.env,
        version: VERSION,
        outputDir: settings.output.outputDir,
        analysis: runtime.analysis,
        weekly: runtime.weekly,
        jobs: () => (scheduler ? [scheduler.describe()] : []),
        logger: logger.child("api"),
      });

      scheduler?.start();
      const server = app.listen(settings.server.port, settings.server.host, () => {
        logger.info(`Listening on http://${settings.server.host}:${settings.server.port} (env: ${settings.env})`);
      });

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        scheduler?.stop();
        server.close();
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    })
  );

program
  .command("analyze")
  .description("Fetch project data and write analysis reports")
  .addOption(new Option("--type <type>", "Which analysis to run").choices(["all", "uncommented", "duplicate"]).default("all"))
  .action((options: { type: "all" | "uncommented" | "duplicate" }) =>
    run(async () => {
      const { analysis } = bootstrap("analysis");
      if (options.type === "uncommented") {
        const result = await analysis.runUncommentedAnalysis();
        console.log(`Report: ${result.reportFile ?? "(not written)"}`);
      } else if (options.type === "duplicate") {
        const result = await analysis.runDuplicateAnalysis();
        console.log(`Report: ${result.reportFile ?? "(not written)"}`);
      } else {
        const result = await analysis.runAll();
        console.log(JSON.stringify(result, null, 2));
      }
    })
  );

program
  .command("data-analyze")
  .description("Analyze a saved classified snapshot without fetching")
  .option("--file <path>", "Snapshot file (defaults to the newest classified_results_*.json)")
  .option("--export-csv", "Also write a CSV export")
  .option("--export-html", "Also write an HTML report")
  .action((options: { file?: string; exportCsv?: boolean; exportHtml?: boolean }) =>
    run(async () => {
      const { analysis } = bootstrap("analysis");
      const result = analysis.analyzeData(options);
      if (result.csvFile) console.log(`CSV: ${result.csvFile}`);
      if (result.htmlFile) console.log(`HTML: ${result.htmlFile}`);
    })
  );

program
  .command("weekly")
  .description("Generate a weekly report from an entity's commits")
  .requiredOption("--entity-id <id>", "TAPD entity id")
  .requiredOption("--workspace-id <id>", "TAPD workspace id")
  .option("--prompt <text>", "Custom prompt instead of the built-in one")
  .option("--no-save", "Do not write the report to a file")
  .option("--print-report", "Print the report to stdout")
  .action((options: { entityId: string; workspaceId: string; prompt?: string; save: boolean; printReport?: boolean }) =>
    run(async () => {
      const { weekly } = bootstrap("weekly");
      const result = await weekly.generate({
        entityId: options.entityId,
        workspaceId: options.workspaceId,
        customPrompt: options.prompt,
        saveToFile: options.save,
      });
      if (result.filePath) console.log(`Saved: ${result.filePath}`);
      if (options.printReport || !result.filePath) console.log(result.report);
    })
  );

program
  .command("fetch-duplicate")
  .description("Run only the duplicate function analysis")
  .action(() =>
    run(async () => {
      const { analysis } = bootstrap("duplicate");
      const result = await analysis.runDuplicateAnalysis();
      console.log(`Report: ${result.reportFile ?? "(not written)"}`);
    })
  );

program.parseAsync().catch((error: unknown) => {
  console.error("Error:", describeError(error));
  process.exit(1);
});
