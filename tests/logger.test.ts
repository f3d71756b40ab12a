import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, expect, it } from "vitest";
import { createLogger, logFilePath } from "../src/logger";

const LINE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - (.+)$/;

describe("createLogger", () => {
  it("formats lines with timestamp, name and level", () => {
    const lines: string[] = [];
    const logger = createLogger({ name: "app", color: false, write: (line) => lines.push(line) });

    logger.info("hello", { project: "p1" });

    expect(lines).toHaveLength(1);
    expect(LINE.exec(lines[0] ?? "")?.[1]).toBe('app - INFO - hello {"project":"p1"}');
  });

  it("drops messages below the threshold", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", color: false, write: (line) => lines.push(line) });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map((line) => LINE.exec(line)?.[1])).toEqual(["quality-pulse - WARN - c", "quality-pulse - ERROR - d"]);
  });

  it("derives dotted child names", () => {
    const lines: string[] = [];
    const logger = createLogger({ name: "app", color: false, write: (line) => lines.push(line) }).child("http");

    logger.error("down");

    expect(logger.name).toBe("app.http");
    expect(LINE.exec(lines[0] ?? "")?.[1]).toBe("app.http - ERROR - down");
  });

  it("appends plain lines to a log file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-test-"));
    try {
      const file = logFilePath(path.join(dir, "log"), "api", new Date(2025, 0, 10, 7, 30, 0));
      const logger = createLogger({ color: true, write: () => {}, logFile: file });

      logger.info("started");

      expect(path.basename(file)).toBe("api_20250110_073000.log");
      expect(LINE.exec(fs.readFileSync(file, "utf-8").trimEnd())?.[1]).toBe("quality-pulse - INFO - started");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
