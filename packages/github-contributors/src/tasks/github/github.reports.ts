import { SUMMARY_COLUMN } from "./data-config";
import type { ContributorReport } from "./fetch-all";

export function summaryColumnWidth(repositories: Iterable<string>): number {
  let longest = 0;
  let any = false;
  for (const repository of repositories) {
    any = true;
    longest = Math.max(longest, repository.length);
  }
  if (!any) return SUMMARY_COLUMN.DEFAULT_WIDTH;

  return Math.min(
    Math.max(SUMMARY_COLUMN.DEFAULT_WIDTH, longest),
    SUMMARY_COLUMN.MAX_WIDTH
  );
}

export function formatSummary(
  report: Pick<ContributorReport, "repositoryCounts" | "totalUniqueContributors">
): string[] {
  const width = summaryColumnWidth(report.repositoryCounts.keys());
  const countWidth = SUMMARY_COLUMN.COUNT_WIDTH;
  const rule = "-".repeat(width + countWidth + 2);
  const line = (label: string, value: string | number) =>
    `${label.padEnd(width)} ${String(value).padEnd(countWidth)}`;

  const lines = [
    "",
    "Contributor Summary:",
    line("Repository", "Unique Contributors"),
    rule,
  ];
  for (const [repository, count] of report.repositoryCounts) {
    lines.push(line(repository, count));
  }
  lines.push(rule, line("Total", report.totalUniqueContributors));

  return lines;
}

export function printSummary(
  report: Pick<ContributorReport, "repositoryCounts" | "totalUniqueContributors">
): void {
  for (const line of formatSummary(report)) {
    console.log(line);
  }
}
