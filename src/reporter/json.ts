import * as fs from "fs";
import * as path from "path";
import { fileTimestamp } from "../util/time";

export type SnapshotOptions = {
  pretty?: boolean;
  now?: Date;
};

/** Writes `<dir>/<prefix>_<YYYYMMDD_HHMMSS>.json` and returns its path. */
export function writeJsonSnapshot(data: unknown, outputDir: string, prefix: string, options: SnapshotOptions = {}): string {
  const filePath = path.join(outputDir, `${prefix}_${fileTimestamp(options.now)}.json`);
  fs.mkdirSync(outputDir, { recursive: true });
  const body = options.pretty === false ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  fs.writeFileSync(filePath, body, "utf-8");
  return filePath;
}

/** Newest `<prefix>_*.json` in a directory by name, which sorts by timestamp. */
export function latestSnapshot(outputDir: string, prefix: string): string | undefined {
  if (!fs.existsSync(outputDir)) return undefined;
  const candidates = fs
    .readdirSync(outputDir)
    .filter((name) => name.startsWith(`${prefix}_`) && name.endsWith(".json"))
    .sort();
  const newest = candidates[candidates.length - 1];
  return newest === undefined ? undefined : path.join(outputDir, newest);
}
