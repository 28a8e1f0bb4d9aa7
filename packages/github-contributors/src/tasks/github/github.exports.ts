import * as fs from "fs";
import * as path from "path";
import { CSV_HEADERS } from "./data-config";
import type { ContributorRow } from "./fetch-all";

const COLUMNS = ["repository", "email", "name", "lastCommit"] as const;

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatContributorsCsv(rows: readonly ContributorRow[]): string {
  const lines = [
    COLUMNS.map((column) => escapeCsvField(CSV_HEADERS[column])).join(","),
    ...rows.map((row) =>
      COLUMNS.map((column) => escapeCsvField(row[column])).join(",")
    ),
  ];
  return lines.map((line) => `${line}\r\n`).join("");
}

export function exportContributors(
  outputPath: string,
  rows: readonly ContributorRow[]
): void {
  const outputDir = path.dirname(path.resolve(outputPath));
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  fs.writeFileSync(outputPath, formatContributorsCsv(rows), "utf8");
}
