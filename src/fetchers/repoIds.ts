import * as fs from "fs";
import { z } from "zod";
import { ConfigError, describeError } from "../errors";
import { Logger } from "../logger";

const repoIdsSchema = z.array(z.string().min(1));
const repoNamesSchema = z.array(z.object({ repoId: z.string(), repoName: z.string() }));

export function loadRepoIds(file: string): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot read repository id list ${file}`, { cause: error });
  }
  const parsed = repoIdsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Repository id list ${file} must be a JSON array of strings`);
  }
  return parsed.data;
}

/** Optional id → display name mapping. Missing or malformed files give an empty map. */
export function loadRepoNames(file: string, logger?: Logger): Map<string, string> {
  if (!fs.existsSync(file)) {
    logger?.debug(`Repository name mapping not found: ${file}`);
    return new Map();
  }
  try {
    const parsed = repoNamesSchema.safeParse(JSON.parse(fs.readFileSync(file, "utf-8")));
    if (!parsed.success) {
      logger?.warn(`Ignoring malformed repository name mapping: ${file}`);
      return new Map();
    }
    return new Map(parsed.data.map((item): [string, string] => [item.repoId, item.repoName]));
  } catch (error) {
    logger?.warn(`Ignoring unreadable repository name mapping ${file}: ${describeError(error)}`);
    return new Map();
  }
}

export function displayName(projectId: string, names: Map<string, string>): string {
  const mapped = names.get(projectId);
  if (mapped !== undefined) return mapped;
  if (projectId.length > 20) return `${projectId.slice(0, 8)}...${projectId.slice(-4)}`;
  return projectId;
}
