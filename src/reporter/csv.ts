import * as fs from "fs";
import * as path from "path";
import { DuplicateGroup } from "../analyzers/types";
import { displayName } from "../fetchers/repoIds";

const BOM = "\uFEFF";
const EOL = "\r\n";

export type CsvRow = Record<string, unknown>;

export type CsvOptions = {
  columns?: string[];
  /** Prefix with a UTF-8 byte order mark so spreadsheet apps detect the encoding. */
  bom?: boolean;
};

export const DUPLICATE_COLUMNS = [
  "rank",
  "projectId",
  "projectName",
  "groupName",
  "language",
  "numFunctions",
  "numFiles",
  "maxComplexity",
  "avgLines",
  "filePaths",
  "emails",
];

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

export function escapeCell(value: unknown): string {
  const text = cellText(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Sorted union of the keys of every row. */
export function unionColumns(rows: CsvRow[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) Object.keys(row).forEach((key) => keys.add(key));
  return [...keys].sort();
}

export function toCsv(rows: CsvRow[], options: CsvOptions = {}): string {
  const columns = options.columns ?? unionColumns(rows);
  const lines = [columns.map(escapeCell).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCell(row[column])).join(","));
  }
  return `${options.bom === false ? "" : BOM}${lines.join(EOL)}${EOL}`;
}

/** Parses RFC 4180 text into rows of cells. A leading BOM is dropped. */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith(BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (quoted) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\r" || ch === "\n") {
      if (ch === "\r" && source[i + 1] === "\n") i++;
      row.push(cell);
      rows.push(row);
      row = [];
      cell = "";
    } else {
      cell += ch;
    }
  }

  if (cell !== "" || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

/** Rows keyed by the header line. */
export function parseCsvRecords(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  return rows.map((cells) => Object.fromEntries(header.map((column, i) => [column, cells[i] ?? ""])));
}

function writeCsv(file: string, content: string): string {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

export function writeRecordsCsv(records: CsvRow[], file: string): string {
  return writeCsv(file, toCsv(records));
}

export function duplicateRows(groups: DuplicateGroup[], names: Map<string, string>): CsvRow[] {
  return groups.map((group, i) => ({
    rank: i + 1,
    projectId: group.projectId,
    projectName: displayName(group.projectId, names),
    groupName: group.groupName,
    language: group.language,
    numFunctions: group.numFunctions,
    numFiles: group.numFiles,
    maxComplexity: group.maxComplexity,
    avgLines: group.avgLines.toFixed(1),
    filePaths: group.filePaths.join("; "),
    emails: group.emails.join("; "),
  }));
}

export function writeDuplicateCsv(groups: DuplicateGroup[], names: Map<string, string>, file: string): string {
  return writeCsv(file, toCsv(duplicateRows(groups, names), { columns: DUPLICATE_COLUMNS }));
}
