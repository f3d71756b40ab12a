import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { Logger } from "./logger";

// Shape of config.json. Every section is optional; defaults mirror config.example.json.
const fileSchema = z.object({
  server: z
    .object({
      host: z.string().default("0.0.0.0"),
      port: z.coerce.number().int().positive().default(8080),
      debug: z.boolean().default(false),
    })
    .default({}),
  api_url: z.string().default(""),
  duplicate_url: z.string().default(""),
  token: z.string().default(""),
  repo_ids_file: z.string().default("repoIds_simple.json"),
  repo_names_file: z.string().default("assets/repoId_repoName_list.json"),
  authors: z.array(z.string()).default([]),
  llm: z
    .object({
      api_key: z.string().default(""),
      model: z.string().default("claude-sonnet-4-5-20250929"),
    })
    .default({}),
  tapd: z
    .object({
      base_url: z.string().default("https://www.tapd.cn/api/devops/source_code"),
      cookies: z.record(z.string()).default({}),
    })
    .default({}),
  request_settings: z
    .object({
      timeout: z.number().positive().default(30),
      retry_times: z.number().int().min(1).default(3),
      retry_delay: z.number().min(0).default(2.0),
      batch_delay: z.number().min(0).default(0.5),
      page_size: z.number().int().positive().default(100),
    })
    .default({}),
  output_settings: z
    .object({
      output_dir: z.string().default("output"),
      log_dir: z.string().default("log"),
      save_classified: z.boolean().default(true),
      pretty_print: z.boolean().default(true),
    })
    .default({}),
  schedule: z
    .object({
      enabled: z.boolean().default(true),
      hour: z.number().int().min(0).max(23).default(7),
      minute: z.number().int().min(0).max(59).default(0),
    })
    .default({}),
  report: z
    .object({
      top_n: z.number().int().positive().default(20),
    })
    .default({}),
});

export type ConfigFile = z.input<typeof fileSchema>;

export type Settings = {
  env: string;
  server: { host: string; port: number; debug: boolean };
  merico: {
    apiUrl: string;
    duplicateUrl: string;
    token: string;
    repoIdsFile: string;
    repoNamesFile: string;
    authors: string[];
  };
  llm: { apiKey: string; model: string };
  tapd: { baseUrl: string; cookies: Record<string, string> };
  request: {
    timeoutSeconds: number;
    retryTimes: number;
    retryDelaySeconds: number;
    batchDelaySeconds: number;
    pageSize: number;
  };
  output: { outputDir: string; logDir: string; saveClassified: boolean; prettyPrint: boolean };
  schedule: { enabled: boolean; hour: number; minute: number };
  report: { topN: number };
};

type Env = Record<string, string | undefined>;

export function parseSettings(raw: unknown, env: Env = process.env): Settings {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  const file = parsed.data;

  const port = env.SERVER_PORT !== undefined ? Number(env.SERVER_PORT) : file.server.port;
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigError(`Invalid SERVER_PORT: "${env.SERVER_PORT}"`);
  }

  return {
    env: env.ENV ?? "development",
    server: {
      host: env.SERVER_HOST ?? file.server.host,
      port,
      debug: env.DEBUG !== undefined ? env.DEBUG.toLowerCase() === "true" : file.server.debug,
    },
    merico: {
      apiUrl: env.MERICO_API_URL ?? file.api_url,
      duplicateUrl: env.MERICO_DUPLICATE_URL ?? file.duplicate_url,
      token: env.MERICO_TOKEN ?? file.token,
      repoIdsFile: file.repo_ids_file,
      repoNamesFile: file.repo_names_file,
      authors: file.authors,
    },
    llm: {
      apiKey: env.ANTHROPIC_API_KEY ?? file.llm.api_key,
      model: env.LLM_MODEL ?? file.llm.model,
    },
    tapd: {
      baseUrl: env.TAPD_BASE_URL ?? file.tapd.base_url,
      cookies: file.tapd.cookies,
    },
    request: {
      timeoutSeconds: file.request_settings.timeout,
      retryTimes: file.request_settings.retry_times,
      retryDelaySeconds: file.request_settings.retry_delay,
      batchDelaySeconds: file.request_settings.batch_delay,
      pageSize: file.request_settings.page_size,
    },
    output: {
      outputDir: file.output_settings.output_dir,
      logDir: file.output_settings.log_dir,
      saveClassified: file.output_settings.save_classified,
      prettyPrint: file.output_settings.pretty_print,
    },
    schedule: { ...file.schedule },
    report: { topN: file.report.top_n },
  };
}

/**
 * Reads config.json (or the given path) and applies environment overrides.
 * A missing file falls back to defaults; an unreadable or invalid one is fatal.
 */
export function loadSettings(configPath: string, logger: Logger, env: Env = process.env): Settings {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    logger.warn(`Config file not found: ${resolved}, using defaults`);
    return parseSettings({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${resolved}`, { cause: error });
  }

  logger.info(`Loaded config file: ${resolved}`);
  return parseSettings(raw, env);
}

export function requireSetting(value: string, name: string): string {
  if (value.trim() === "") {
    throw new ConfigError(`Missing required setting: ${name}`);
  }
  return value;
}
