import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { displayTimestamp, fileTimestamp } from "./util/time";

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

export type Logger = {
  readonly name: string;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(name: string): Logger;
};

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  color?: boolean;
  /** Extra sink for each formatted line; defaults to stderr. */
  write?: (line: string) => void;
  /** When set, every line is also appended to this file. */
  logFile?: string;
};

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(options: LoggerOptions = {}): Logger {
  const palette = new chalk.Instance({ level: options.color === false ? 0 : 1 });
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const logFile = options.logFile;

  const paint: Record<LogLevel, (text: string) => string> = {
    debug: palette.gray,
    info: palette.cyan,
    warn: palette.yellow,
    error: palette.red,
  };

  const build = (name: string): Logger => {
    const emit = (level: LogLevel, message: string, context?: LogContext): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
      const plain = `${displayTimestamp()} - ${name} - ${level.toUpperCase()} - ${message}${suffix}`;
      write(`${displayTimestamp()} - ${name} - ${paint[level](level.toUpperCase())} - ${message}${suffix}`);
      if (logFile) {
        fs.appendFileSync(logFile, `${plain}\n`, "utf-8");
      }
    };

    return {
      name,
      debug: (message, context) => emit("debug", message, context),
      info: (message, context) => emit("info", message, context),
      warn: (message, context) => emit("warn", message, context),
      error: (message, context) => emit("error", message, context),
      child: (childName) => build(`${name}.${childName}`),
    };
  };

  return build(options.name ?? "quality-pulse");
}

/** Log file path for a run, e.g. log/api_20250110_073000.log. Creates the directory. */
export function logFilePath(logDir: string, prefix: string, date: Date = new Date()): string {
  fs.mkdirSync(logDir, { recursive: true });
  return path.join(logDir, `${prefix}_${fileTimestamp(date)}.log`);
}

export function silentLogger(): Logger {
  return createLogger({ level: "error", color: false, write: () => {} });
}
